import type { z } from "zod";
import type {
  ContentPartSchema,
  InferenceMessageSchema,
  InferenceRequestSchema,
} from "./inference.schema.js";

export type ContentPart = z.infer<typeof ContentPartSchema>;
export type InferenceMessage = z.infer<typeof InferenceMessageSchema>;
export type InferenceRequest = z.infer<typeof InferenceRequestSchema>;

export interface InferenceChoice {
  index: number;
  message: {
    role: string;
    content: string;
  };
  finish_reason: string;
}

export interface InferenceUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

/** Response shape every protocol is normalized to */
export interface InferenceResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: InferenceChoice[];
  usage: InferenceUsage;
}

export interface InferenceChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: {
    index: number;
    delta: { content: string };
    finish_reason: string | null;
  }[];
}
