export interface TenantCredential {
  readonly tenantId: string;
  readonly oauthClientId: string;
  readonly oauthClientSecret: string;
  readonly oauthTokenUrl: string;
  readonly apiBaseUrl: string;
  readonly resourceGroup: string;
}

/**
 * Supplies the raw credentials blob, or `undefined` when none is configured.
 */
export interface CredentialSource {
  read(): Promise<string | undefined>;
}

export const CREDENTIAL_SOURCE = Symbol("CREDENTIAL_SOURCE");
