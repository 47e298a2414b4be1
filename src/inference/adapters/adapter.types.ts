import type { InferenceChunk, InferenceMessage, InferenceResponse } from "../inference.types.js";
import type { InferenceProtocol } from "../protocol.classifier.js";

export interface AdapterInput {
  /** Inference base URL of the deployment, without trailing slash */
  deploymentUrl: string;
  /** Empty when the deployment declares no model */
  modelName: string;
  messages: InferenceMessage[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  stream: boolean;
}

export interface UpstreamCall<B = unknown> {
  url: string;
  body: B;
}

export interface ProtocolAdapter {
  readonly protocol: InferenceProtocol;
  buildRequest(input: AdapterInput): UpstreamCall;
  parseResponse(body: string, modelName: string): InferenceResponse;
  /**
   * Rewrites one parsed stream event into a completion chunk.
   * Returning undefined forwards the event unchanged.
   */
  convertChunk?(event: unknown, modelName: string): InferenceChunk | undefined;
}

export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.7;
