export { PROTOCOL_ADAPTERS } from "./adapters/index.js";
export { DEFAULT_CONTEXT_LIMIT, getContextLimit, trimMessages } from "./context-window.js";
export { InferenceModule } from "./inference.module.js";
export { InferenceService } from "./inference.service.js";
export type {
  ContentPart,
  InferenceChunk,
  InferenceMessage,
  InferenceRequest,
  InferenceResponse,
} from "./inference.types.js";
export { classifyProtocol, extractModelName, InferenceProtocol } from "./protocol.classifier.js";
