import { Inject, Injectable, Logger } from "@nestjs/common";
import { formatZodError } from "../common/validation.utils.js";
import { ConfigService } from "../config/config.service.js";
import { CredentialStoreService } from "../credentials/credential-store.service.js";
import type { TenantCredential } from "../credentials/credentials.types.js";
import { UpstreamAuthFailedError } from "../errors/index.js";
import { describeTransportError, isSuccess, UpstreamHttpClient } from "../upstream/upstream-http.client.js";
import type { UpstreamResponse } from "../upstream/upstream.types.js";
import {
  type CachedToken,
  TOKEN_SAFETY_MARGIN_MS,
  TOKEN_STORE,
  TokenResponseSchema,
  type TokenStore,
} from "./token.types.js";

/**
 * Bearer tokens per tenant, refreshed lazily on use.
 *
 * Concurrent misses for the same tenant share one token request; other tenants
 * are never blocked by it.
 */
@Injectable()
export class TokenCacheService {
  private readonly logger = new Logger(TokenCacheService.name);
  private readonly inflight = new Map<string, Promise<string>>();

  constructor(
    @Inject(TOKEN_STORE) private readonly store: TokenStore,
    private readonly credentialStore: CredentialStoreService,
    private readonly http: UpstreamHttpClient,
    private readonly configService: ConfigService,
  ) {}

  async getToken(tenantId: string): Promise<string> {
    const credential = await this.credentialStore.get(tenantId);
    return this.getTokenFor(credential);
  }

  async getTokenFor(credential: TenantCredential): Promise<string> {
    const cached = this.store.get(credential.tenantId);
    if (cached && Date.now() < cached.expiresAt) {
      return cached.bearerToken;
    }

    const pending = this.inflight.get(credential.tenantId);
    if (pending) {
      return pending;
    }

    const request = this.refresh(credential).finally(() => {
      this.inflight.delete(credential.tenantId);
    });
    this.inflight.set(credential.tenantId, request);
    return request;
  }

  private async refresh(credential: TenantCredential): Promise<string> {
    const fetchedAt = Date.now();
    const { accessToken, expiresIn } = await this.requestToken(credential);

    const token: CachedToken = {
      tenantId: credential.tenantId,
      bearerToken: accessToken,
      expiresAt: fetchedAt + expiresIn * 1000 - TOKEN_SAFETY_MARGIN_MS,
    };
    this.store.put(token);
    this.logger.log(`Fetched access token for tenant ${credential.tenantId} (expires in ${String(expiresIn)}s)`);
    return accessToken;
  }

  private async requestToken(
    credential: TenantCredential,
  ): Promise<{ accessToken: string; expiresIn: number }> {
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: credential.oauthClientId,
      client_secret: credential.oauthClientSecret,
    });

    let response: UpstreamResponse;
    try {
      response = await this.http.send({
        method: "POST",
        url: credential.oauthTokenUrl,
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: form.toString(),
        timeoutMs: this.configService.get("upstreamTimeout"),
      });
    } catch (error) {
      throw new UpstreamAuthFailedError(credential.tenantId, null, describeTransportError(error));
    }

    if (!isSuccess(response.status)) {
      throw new UpstreamAuthFailedError(credential.tenantId, response.status, response.body);
    }

    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch {
      throw new UpstreamAuthFailedError(credential.tenantId, response.status, response.body);
    }
    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamAuthFailedError(
        credential.tenantId,
        response.status,
        response.body,
        `invalid token response: ${formatZodError(parsed.error)}`,
      );
    }
    return { accessToken: parsed.data.access_token, expiresIn: parsed.data.expires_in };
  }
}
