export type UpstreamMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface UpstreamRequest {
  method: UpstreamMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface UpstreamResponse {
  status: number;
  body: string;
}

export interface UpstreamStream {
  status: number;
  /** Raw body chunks; only consumed when status is 2xx */
  chunks: AsyncIterable<Uint8Array>;
  /** Reads the remaining body as text (used for error reporting) */
  text(): Promise<string>;
}
