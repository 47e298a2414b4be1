/** Ordered, de-duplicated tenant ids a caller may act as */
export type TenantScope = readonly string[];

export interface MeResponse {
  user: string;
  tenants: string[];
}

// Upper bound on organizations visited when scanning for ownership
export const ORGANIZATION_SCAN_LIMIT = 1000;
