import { Injectable } from "@nestjs/common";
import type { UpstreamRequest, UpstreamResponse, UpstreamStream } from "./upstream.types.js";

/**
 * Thin fetch wrapper for calls to tenant backends.
 * Transport failures and timeouts reject with the underlying error; callers map them
 * to the gateway error kind that fits the endpoint.
 */
@Injectable()
export class UpstreamHttpClient {
  async send(req: UpstreamRequest): Promise<UpstreamResponse> {
    const resp = await this.fetch(req);
    const body = await resp.text();
    return { status: resp.status, body };
  }

  async stream(req: UpstreamRequest): Promise<UpstreamStream> {
    const resp = await this.fetch(req);
    const body = resp.body;
    return {
      status: resp.status,
      chunks: body ?? emptyChunks(),
      text: () => resp.text(),
    };
  }

  private fetch(req: UpstreamRequest): Promise<Response> {
    return fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: AbortSignal.timeout(req.timeoutMs),
    });
  }
}

/**
 * Headers every tenant-scoped call carries
 */
export function tenantHeaders(accessToken: string, resourceGroup: string): Record<string, string> {
  return {
    Authorization: `Bearer ${accessToken}`,
    "Content-Type": "application/json",
    "AI-Resource-Group": resourceGroup,
  };
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function describeTransportError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "TimeoutError" ? "request timed out" : error.message;
  }
  return String(error);
}

async function* emptyChunks(): AsyncGenerator<Uint8Array, void, undefined> {}
