import { Injectable } from "@nestjs/common";
import type { CachedToken, TokenStore } from "./token.types.js";

@Injectable()
export class InMemoryTokenStore implements TokenStore {
  private readonly tokens = new Map<string, CachedToken>();

  get(tenantId: string): CachedToken | undefined {
    return this.tokens.get(tenantId);
  }

  put(token: CachedToken): void {
    this.tokens.set(token.tenantId, token);
  }
}
