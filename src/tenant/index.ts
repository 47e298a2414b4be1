export { TenantResolverService } from "./tenant-resolver.service.js";
export { TenantModule } from "./tenant.module.js";
export type { MeResponse, TenantScope } from "./tenant.types.js";
export { extractTagTenants, uniqueInOrder } from "./tenant.utils.js";
