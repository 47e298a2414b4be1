import { z } from "zod";
import { decodeJson } from "../../upstream/decode.js";
import type { InferenceResponse } from "../inference.types.js";
import { InferenceProtocol } from "../protocol.classifier.js";
import {
  type AdapterInput,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type ProtocolAdapter,
  type UpstreamCall,
} from "./adapter.types.js";
import { messageText, unixSeconds } from "./content.utils.js";

export const ANTHROPIC_VERSION = "bedrock-2023-05-31";

export interface AnthropicRequestBody {
  anthropic_version: string;
  messages: { role: string; content: string }[];
  system?: string;
  max_tokens: number;
  temperature: number;
  top_p?: number;
}

const AnthropicResponseSchema = z.object({
  id: z.string().default(""),
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  stop_reason: z.string().nullish(),
  usage: z
    .object({
      input_tokens: z.number().int().default(0),
      output_tokens: z.number().int().default(0),
    })
    .default({}),
});

/**
 * Messages API on Bedrock. System messages leave the message list and the
 * last one becomes the `system` prompt.
 */
export function buildAnthropicRequest(input: AdapterInput): UpstreamCall<AnthropicRequestBody> {
  let system: string | undefined;
  const messages: AnthropicRequestBody["messages"] = [];
  for (const message of input.messages) {
    if (message.role === "system") {
      system = messageText(message);
    } else {
      messages.push({ role: message.role, content: messageText(message) });
    }
  }

  return {
    url: `${input.deploymentUrl}${input.stream ? "/invoke-with-response-stream" : "/invoke"}`,
    body: {
      anthropic_version: ANTHROPIC_VERSION,
      messages,
      ...(system ? { system } : {}),
      max_tokens: input.max_tokens ?? DEFAULT_MAX_TOKENS,
      temperature: input.temperature ?? DEFAULT_TEMPERATURE,
      ...(input.top_p !== undefined ? { top_p: input.top_p } : {}),
    },
  };
}

export function parseAnthropicResponse(body: string, modelName: string): InferenceResponse {
  const resp = decodeJson(body, AnthropicResponseSchema, "Anthropic response");
  const text = resp.content
    .filter((block) => block.type === "text")
    .map((block) => block.text ?? "")
    .join("");
  const { input_tokens, output_tokens } = resp.usage;

  return {
    id: resp.id,
    object: "chat.completion",
    created: unixSeconds(),
    model: resp.model || modelName,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: text },
        finish_reason: resp.stop_reason ?? "",
      },
    ],
    usage: {
      prompt_tokens: input_tokens,
      completion_tokens: output_tokens,
      total_tokens: input_tokens + output_tokens,
    },
  };
}

export const anthropicAdapter: ProtocolAdapter = {
  protocol: InferenceProtocol.Anthropic,
  buildRequest: buildAnthropicRequest,
  parseResponse: parseAnthropicResponse,
};
