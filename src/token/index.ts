export { InMemoryTokenStore } from "./in-memory-token.store.js";
export { TenantApiClient, type TenantApiRequest } from "./tenant-api.client.js";
export { TokenCacheService } from "./token-cache.service.js";
export { TokenModule } from "./token.module.js";
export {
  type CachedToken,
  TOKEN_SAFETY_MARGIN_MS,
  TOKEN_STORE,
  type TokenStore,
} from "./token.types.js";
