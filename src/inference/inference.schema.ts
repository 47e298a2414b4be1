import { z } from "zod";

// Content parts for multimodal messages
export const TextPartSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const ImageUrlPartSchema = z.object({
  type: z.literal("image_url"),
  image_url: z.object({ url: z.string().min(1) }),
});

export const ContentPartSchema = z.discriminatedUnion("type", [TextPartSchema, ImageUrlPartSchema]);

export const InferenceMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.union([z.string(), z.array(ContentPartSchema)]),
});

export const InferenceRequestSchema = z.object({
  deploymentId: z.string().min(1, "deploymentId is required"),
  tenant: z.string().min(1).optional(),
  messages: z.array(InferenceMessageSchema).min(1, "messages array must not be empty"),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  stream: z.boolean().optional(),
});
