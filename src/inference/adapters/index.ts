import { InferenceProtocol } from "../protocol.classifier.js";
import type { ProtocolAdapter } from "./adapter.types.js";
import { anthropicAdapter } from "./anthropic.adapter.js";
import { geminiAdapter } from "./gemini.adapter.js";
import { gptAdapter } from "./gpt.adapter.js";
import { orchestrationAdapter } from "./orchestration.adapter.js";

export const PROTOCOL_ADAPTERS: Readonly<Record<InferenceProtocol, ProtocolAdapter>> = {
  [InferenceProtocol.Anthropic]: anthropicAdapter,
  [InferenceProtocol.Gpt]: gptAdapter,
  [InferenceProtocol.Gemini]: geminiAdapter,
  [InferenceProtocol.Orchestration]: orchestrationAdapter,
};

export type { AdapterInput, ProtocolAdapter, UpstreamCall } from "./adapter.types.js";
export { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "./adapter.types.js";
export { ANTHROPIC_VERSION, buildAnthropicRequest, parseAnthropicResponse } from "./anthropic.adapter.js";
export {
  buildGeminiRequest,
  convertGeminiChunk,
  imageMimeType,
  parseGeminiResponse,
} from "./gemini.adapter.js";
export { buildGptRequest, gptApiVersion, isReasoningModel, parseGptResponse } from "./gpt.adapter.js";
export {
  buildOrchestrationRequest,
  DEFAULT_ORCHESTRATION_MODEL,
  parseOrchestrationResponse,
} from "./orchestration.adapter.js";
