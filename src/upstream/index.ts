export { decodeJson } from "./decode.js";
export {
  describeTransportError,
  isSuccess,
  tenantHeaders,
  UpstreamHttpClient,
} from "./upstream-http.client.js";
export { UpstreamModule } from "./upstream.module.js";
export type {
  UpstreamMethod,
  UpstreamRequest,
  UpstreamResponse,
  UpstreamStream,
} from "./upstream.types.js";
