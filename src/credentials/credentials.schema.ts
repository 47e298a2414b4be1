import { z } from "zod";

// One entry of the TENANT_CREDENTIALS JSON array
export const TenantCredentialRecordSchema = z.object({
  team: z.string().min(1, "team is required"),
  clientId: z.string().min(1, "clientId is required"),
  clientSecret: z.string().min(1, "clientSecret is required"),
  oauthUrl: z.string().url("oauthUrl must be a valid URL"),
  apiUrl: z.string().url("apiUrl must be a valid URL"),
  resourceGroup: z.string().min(1, "resourceGroup is required"),
});

export const TenantCredentialListSchema = z.array(TenantCredentialRecordSchema);

export type TenantCredentialRecord = z.infer<typeof TenantCredentialRecordSchema>;
