import { Inject, Injectable, Logger } from "@nestjs/common";
import { formatZodError } from "../common/validation.utils.js";
import { ConfigMissingError, TenantNotFoundError } from "../errors/index.js";
import { TenantCredentialListSchema, type TenantCredentialRecord } from "./credentials.schema.js";
import {
  CREDENTIAL_SOURCE,
  type CredentialSource,
  type TenantCredential,
} from "./credentials.types.js";

type CredentialMap = ReadonlyMap<string, TenantCredential>;

type LoadState =
  | { status: "uninitialized" }
  | { status: "loading"; promise: Promise<CredentialMap> }
  | { status: "loaded"; credentials: CredentialMap }
  | { status: "failed"; error: ConfigMissingError };

/**
 * Per-tenant OAuth2 client credentials, loaded at most once per process.
 *
 * Concurrent first callers share the single in-flight load. A failed load is
 * terminal: the same error is returned for the rest of the process lifetime, so a
 * configuration fixed after startup is only picked up by a restart.
 */
@Injectable()
export class CredentialStoreService {
  private readonly logger = new Logger(CredentialStoreService.name);
  private state: LoadState = { status: "uninitialized" };

  constructor(@Inject(CREDENTIAL_SOURCE) private readonly source: CredentialSource) {}

  async load(): Promise<CredentialMap> {
    switch (this.state.status) {
      case "loaded":
        return this.state.credentials;
      case "failed":
        throw this.state.error;
      case "loading":
        return this.state.promise;
      case "uninitialized": {
        const promise = this.readCredentials().then(
          (credentials) => {
            this.state = { status: "loaded", credentials };
            this.logger.log(`Loaded credentials for ${String(credentials.size)} tenants`);
            return credentials;
          },
          (error: unknown) => {
            const failure =
              error instanceof ConfigMissingError
                ? error
                : new ConfigMissingError(error instanceof Error ? error.message : String(error));
            this.state = { status: "failed", error: failure };
            this.logger.error(failure.message);
            throw failure;
          },
        );
        this.state = { status: "loading", promise };
        return promise;
      }
    }
  }

  async get(tenantId: string): Promise<TenantCredential> {
    const credentials = await this.load();
    const credential = credentials.get(tenantId);
    if (!credential) {
      throw new TenantNotFoundError(tenantId);
    }
    return credential;
  }

  async has(tenantId: string): Promise<boolean> {
    const credentials = await this.load();
    return credentials.has(tenantId);
  }

  async tenantIds(): Promise<string[]> {
    const credentials = await this.load();
    return [...credentials.keys()];
  }

  private async readCredentials(): Promise<CredentialMap> {
    const raw = await this.source.read();
    if (raw === undefined || raw.trim() === "") {
      throw new ConfigMissingError("no credentials configured");
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ConfigMissingError(
        `credentials are not valid JSON (${error instanceof Error ? error.message : String(error)})`,
      );
    }

    const parsed = TenantCredentialListSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigMissingError(`invalid credentials: ${formatZodError(parsed.error)}`);
    }

    const credentials = new Map<string, TenantCredential>();
    for (const record of parsed.data) {
      credentials.set(record.team, toCredential(record));
    }
    return credentials;
  }
}

function toCredential(record: TenantCredentialRecord): TenantCredential {
  return {
    tenantId: record.team,
    oauthClientId: record.clientId,
    oauthClientSecret: record.clientSecret,
    oauthTokenUrl: record.oauthUrl,
    apiBaseUrl: record.apiUrl.replace(/\/+$/, ""),
    resourceGroup: record.resourceGroup,
  };
}
