import { z } from "zod";
import { decodeJson } from "../../upstream/decode.js";
import type { InferenceChunk, InferenceResponse } from "../inference.types.js";
import { InferenceProtocol } from "../protocol.classifier.js";
import type { AdapterInput, ProtocolAdapter, UpstreamCall } from "./adapter.types.js";
import { messageText, unixSeconds } from "./content.utils.js";

export const DEFAULT_IMAGE_MIME_TYPE = "image/png";

const IMAGE_MIME_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
  heic: "image/heic",
  heif: "image/heif",
};

export type GeminiPart = { text: string } | { fileData: { mimeType: string; fileUri: string } };

export interface GeminiRequestBody {
  contents: { role: "user"; parts: GeminiPart[] };
  generation_config?: { maxOutputTokens?: number; temperature?: number };
}

const GeminiCandidateSchema = z.object({
  content: z
    .object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
      role: z.string().optional(),
    })
    .optional(),
  finishReason: z.string().optional(),
});

const GeminiResponseSchema = z.object({
  candidates: z.array(GeminiCandidateSchema).default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().int().default(0),
      candidatesTokenCount: z.number().int().default(0),
      totalTokenCount: z.number().int().default(0),
    })
    .default({}),
});

const GeminiChunkSchema = z.object({
  candidates: z.array(GeminiCandidateSchema).min(1),
});

/**
 * Mime type of an image reference: taken from a data URL, or guessed from the
 * file extension of a regular URL.
 */
export function imageMimeType(url: string): string {
  const dataUrl = /^data:([^;,]+)[;,]/i.exec(url);
  if (dataUrl?.[1]) {
    return dataUrl[1].toLowerCase();
  }
  const path = url.split(/[?#]/, 1)[0] ?? "";
  const extension = /\.([a-z0-9]+)$/i.exec(path)?.[1]?.toLowerCase();
  return (extension && IMAGE_MIME_TYPES[extension]) || DEFAULT_IMAGE_MIME_TYPE;
}

/**
 * generateContent has no system role: system messages become text parts
 * prefixed with `[System]: `, and the whole conversation is one user turn.
 */
export function buildGeminiRequest(input: AdapterInput): UpstreamCall<GeminiRequestBody> {
  const parts: GeminiPart[] = [];
  for (const message of input.messages) {
    if (message.role === "system") {
      parts.push({ text: `[System]: ${messageText(message)}` });
      continue;
    }
    if (typeof message.content === "string") {
      parts.push({ text: message.content });
      continue;
    }
    for (const part of message.content) {
      if (part.type === "text") {
        parts.push({ text: part.text });
      } else {
        parts.push({
          fileData: { mimeType: imageMimeType(part.image_url.url), fileUri: part.image_url.url },
        });
      }
    }
  }

  const body: GeminiRequestBody = { contents: { role: "user", parts } };
  if (input.max_tokens !== undefined || input.temperature !== undefined) {
    body.generation_config = {
      ...(input.max_tokens !== undefined ? { maxOutputTokens: input.max_tokens } : {}),
      ...(input.temperature !== undefined ? { temperature: input.temperature } : {}),
    };
  }

  const method = input.stream ? "streamGenerateContent" : "generateContent";
  return {
    url: `${input.deploymentUrl}/models/${input.modelName}:${method}`,
    body,
  };
}

export function parseGeminiResponse(body: string, modelName: string): InferenceResponse {
  const resp = decodeJson(body, GeminiResponseSchema, "Gemini response");
  const now = unixSeconds();
  const usage = resp.usageMetadata;

  return {
    id: `gemini-${String(now)}`,
    object: "chat.completion",
    created: now,
    model: modelName,
    choices: resp.candidates.map((candidate, index) => ({
      index,
      message: {
        role: "assistant",
        content: (candidate.content?.parts ?? []).map((part) => part.text ?? "").join(""),
      },
      finish_reason: (candidate.finishReason ?? "").toLowerCase(),
    })),
    usage: {
      prompt_tokens: usage.promptTokenCount,
      completion_tokens: usage.candidatesTokenCount,
      total_tokens: usage.totalTokenCount,
    },
  };
}

/**
 * A streamed candidate carrying text becomes a completion chunk; anything else
 * is forwarded as received.
 */
export function convertGeminiChunk(event: unknown, modelName: string): InferenceChunk | undefined {
  const parsed = GeminiChunkSchema.safeParse(event);
  if (!parsed.success) {
    return undefined;
  }
  const [candidate] = parsed.data.candidates;
  const text = candidate?.content?.parts[0]?.text;
  if (!candidate || text === undefined) {
    return undefined;
  }

  return {
    id: `gemini-${String(Date.now())}`,
    object: "chat.completion.chunk",
    created: unixSeconds(),
    model: modelName,
    choices: [
      {
        index: 0,
        delta: { content: text },
        finish_reason: candidate.finishReason ? candidate.finishReason.toLowerCase() : null,
      },
    ],
  };
}

export const geminiAdapter: ProtocolAdapter = {
  protocol: InferenceProtocol.Gemini,
  buildRequest: buildGeminiRequest,
  parseResponse: parseGeminiResponse,
  convertChunk: convertGeminiChunk,
};
