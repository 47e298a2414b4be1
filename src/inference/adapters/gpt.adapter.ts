import { z } from "zod";
import { decodeJson } from "../../upstream/decode.js";
import type { InferenceMessage, InferenceResponse } from "../inference.types.js";
import { InferenceProtocol } from "../protocol.classifier.js";
import {
  type AdapterInput,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type ProtocolAdapter,
  type UpstreamCall,
} from "./adapter.types.js";
import { unixSeconds } from "./content.utils.js";

export const GPT_API_VERSION = "2023-05-15";
export const GPT_REASONING_API_VERSION = "2024-12-01-preview";

const REASONING_MARKERS = ["o1", "o3-mini", "gpt-5"];

export interface GptRequestBody {
  messages: InferenceMessage[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  stream?: boolean;
}

const GptResponseSchema = z.object({
  id: z.string().default(""),
  created: z.number().int().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().int().default(0),
        message: z.object({
          role: z.string().default("assistant"),
          content: z.string().nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().int().default(0),
      completion_tokens: z.number().int().default(0),
      total_tokens: z.number().int().default(0),
    })
    .default({}),
});

/** Reasoning models reject sampling parameters */
export function isReasoningModel(modelName: string): boolean {
  const model = modelName.toLowerCase();
  return REASONING_MARKERS.some((marker) => model.includes(marker));
}

export function gptApiVersion(modelName: string): string {
  return isReasoningModel(modelName) ? GPT_REASONING_API_VERSION : GPT_API_VERSION;
}

export function buildGptRequest(input: AdapterInput): UpstreamCall<GptRequestBody> {
  const body: GptRequestBody = {
    messages: input.messages.map(({ role, content }) => ({ role, content })),
  };
  if (!isReasoningModel(input.modelName)) {
    body.max_tokens = input.max_tokens ?? DEFAULT_MAX_TOKENS;
    body.temperature = input.temperature ?? DEFAULT_TEMPERATURE;
    if (input.top_p !== undefined) {
      body.top_p = input.top_p;
    }
  }
  if (input.stream) {
    body.stream = true;
  }

  return {
    url: `${input.deploymentUrl}/chat/completions?api-version=${gptApiVersion(input.modelName)}`,
    body,
  };
}

export function parseGptResponse(body: string, modelName: string): InferenceResponse {
  const resp = decodeJson(body, GptResponseSchema, "GPT response");
  return {
    id: resp.id,
    object: "chat.completion",
    created: resp.created ?? unixSeconds(),
    model: resp.model || modelName,
    choices: resp.choices.map((choice) => ({
      index: choice.index,
      message: { role: choice.message.role, content: choice.message.content ?? "" },
      finish_reason: choice.finish_reason ?? "",
    })),
    usage: resp.usage,
  };
}

export const gptAdapter: ProtocolAdapter = {
  protocol: InferenceProtocol.Gpt,
  buildRequest: buildGptRequest,
  parseResponse: parseGptResponse,
};
