import { z } from "zod";

export interface CachedToken {
  readonly tenantId: string;
  readonly bearerToken: string;
  /** Epoch milliseconds; the token is usable while Date.now() < expiresAt */
  readonly expiresAt: number;
}

export interface TokenStore {
  get(tenantId: string): CachedToken | undefined;
  put(token: CachedToken): void;
}

export const TOKEN_STORE = Symbol("TOKEN_STORE");

// Tokens are treated as expired this long before the upstream-declared lifetime ends
export const TOKEN_SAFETY_MARGIN_MS = 5 * 60 * 1000;

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().int().nonnegative().default(0),
});
