export { AuthModule } from "./auth.module.js";
export { type AuthenticatedRequest, IdentityGuard } from "./identity.guard.js";
export type { CallerIdentity, ForwardedIdentity } from "./identity.types.js";
export { parseForwardedIdentity, toCallerIdentity } from "./identity.utils.js";
