export {
  ConfigMissingError,
  DecodeFailedError,
  DeploymentAccessDeniedError,
  DeploymentNotFoundError,
  GatewayError,
  type GatewayErrorKind,
  MemberNotFoundError,
  NoTenantScopeError,
  TenantNotFoundError,
  UnauthenticatedError,
  UpstreamAuthFailedError,
  UpstreamRequestFailedError,
} from "./errors.js";
