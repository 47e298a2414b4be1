import { vi } from "vitest";
import type { CallerIdentity } from "../src/auth/identity.types.js";
import { ConfigService } from "../src/config/config.service.js";
import { CredentialStoreService } from "../src/credentials/credential-store.service.js";
import type { CredentialSource } from "../src/credentials/credentials.types.js";
import type { DirectorySnapshot } from "../src/data/directory.types.js";
import { FileDirectoryRepository } from "../src/data/file-directory.repository.js";
import { InMemoryTokenStore } from "../src/token/in-memory-token.store.js";
import { TenantApiClient } from "../src/token/tenant-api.client.js";
import { TokenCacheService } from "../src/token/token-cache.service.js";
import { UpstreamHttpClient } from "../src/upstream/upstream-http.client.js";
import type { UpstreamResponse } from "../src/upstream/upstream.types.js";

export function credentialRecord(team: string) {
  return {
    team,
    clientId: `${team}-client`,
    clientSecret: "test-secret",
    oauthUrl: `https://auth.${team}.example.com/oauth/token`,
    apiUrl: `https://api.${team}.example.com`,
    resourceGroup: "default",
  };
}

export function credentialsBlob(teams: string[]): string {
  return JSON.stringify(teams.map(credentialRecord));
}

export function staticSource(blob: string | undefined): CredentialSource {
  return { read: async () => blob };
}

export function createCredentialStore(teams: string[]): CredentialStoreService {
  return new CredentialStoreService(staticSource(credentialsBlob(teams)));
}

export function createDirectory(snapshot: Partial<DirectorySnapshot>): FileDirectoryRepository {
  const directory = new FileDirectoryRepository(new ConfigService());
  directory.load(snapshot);
  return directory;
}

export function identity(overrides: Partial<CallerIdentity> = {}): CallerIdentity {
  return {
    username: "alex",
    email: "alex@example.com",
    teamId: "team-1",
    teamRole: "member",
    freeFormTags: undefined,
    ...overrides,
  };
}

export function jsonResponse(status: number, body: unknown): UpstreamResponse {
  return { status, body: JSON.stringify(body) };
}

export interface TenantApiHarness {
  api: TenantApiClient;
  http: UpstreamHttpClient;
  credentialStore: CredentialStoreService;
  tokenCache: TokenCacheService;
}

/**
 * A real TenantApiClient whose token lookups are stubbed; stub `http.send`
 * or `http.stream` in the test to answer upstream calls.
 */
export function createTenantApi(
  teams: string[],
  credentialStore: CredentialStoreService = createCredentialStore(teams),
): TenantApiHarness {
  const http = new UpstreamHttpClient();
  const config = new ConfigService();
  const tokenCache = new TokenCacheService(new InMemoryTokenStore(), credentialStore, http, config);
  vi.spyOn(tokenCache, "getTokenFor").mockResolvedValue("test-token");
  return {
    api: new TenantApiClient(credentialStore, tokenCache, http, config),
    http,
    credentialStore,
    tokenCache,
  };
}
