import { z } from "zod";

export const ModelVersionSchema = z
  .object({
    name: z.string(),
    isLatest: z.boolean().default(false),
    deprecated: z.boolean().default(false),
    retirementDate: z.string().optional(),
    contextLength: z.number().int().optional(),
    inputTypes: z.array(z.string()).optional(),
    capabilities: z.array(z.string()).optional(),
    streamingSupported: z.boolean().optional(),
  })
  .passthrough();

export const ModelSchema = z
  .object({
    model: z.string(),
    executableId: z.string().default(""),
    description: z.string().default(""),
    displayName: z.string().optional(),
    accessType: z.string().optional(),
    provider: z.string().optional(),
    versions: z.array(ModelVersionSchema).default([]),
  })
  .passthrough();

export const ModelsListSchema = z.object({
  count: z.number().int().optional(),
  resources: z.array(ModelSchema).default([]),
});

export const ListModelsQuerySchema = z.object({
  scenarioId: z.string().min(1, "scenarioId is required"),
  tenant: z.string().min(1).optional(),
});
