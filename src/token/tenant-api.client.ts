import { Injectable } from "@nestjs/common";
import { ConfigService } from "../config/config.service.js";
import { CredentialStoreService } from "../credentials/credential-store.service.js";
import { UpstreamRequestFailedError } from "../errors/index.js";
import {
  describeTransportError,
  tenantHeaders,
  UpstreamHttpClient,
} from "../upstream/upstream-http.client.js";
import type {
  UpstreamMethod,
  UpstreamRequest,
  UpstreamResponse,
  UpstreamStream,
} from "../upstream/upstream.types.js";
import { TokenCacheService } from "./token-cache.service.js";

export interface TenantApiRequest {
  method: UpstreamMethod;
  /** Path below the tenant's API base URL, or an absolute URL */
  target: string;
  body?: unknown;
  /** Defaults to the configured upstream timeout */
  timeoutMs?: number;
}

/**
 * Authenticated calls against one tenant's backend.
 * Resolves credentials and a bearer token, then sends with the tenant headers.
 */
@Injectable()
export class TenantApiClient {
  constructor(
    private readonly credentialStore: CredentialStoreService,
    private readonly tokenCache: TokenCacheService,
    private readonly http: UpstreamHttpClient,
    private readonly configService: ConfigService,
  ) {}

  async request(tenantId: string, req: TenantApiRequest): Promise<UpstreamResponse> {
    const prepared = await this.prepare(tenantId, req);
    try {
      return await this.http.send(prepared);
    } catch (error) {
      throw new UpstreamRequestFailedError(null, describeTransportError(error));
    }
  }

  async stream(tenantId: string, req: TenantApiRequest): Promise<UpstreamStream> {
    const prepared = await this.prepare(tenantId, req);
    try {
      return await this.http.stream(prepared);
    } catch (error) {
      throw new UpstreamRequestFailedError(null, describeTransportError(error));
    }
  }

  private async prepare(tenantId: string, req: TenantApiRequest): Promise<UpstreamRequest> {
    const credential = await this.credentialStore.get(tenantId);
    const token = await this.tokenCache.getTokenFor(credential);
    const url = /^https?:\/\//i.test(req.target) ? req.target : `${credential.apiBaseUrl}${req.target}`;
    return {
      method: req.method,
      url,
      headers: tenantHeaders(token, credential.resourceGroup),
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      timeoutMs: req.timeoutMs ?? this.configService.get("upstreamTimeout"),
    };
  }
}
