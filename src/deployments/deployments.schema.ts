import { z } from "zod";

// Upstream wire shapes. Unknown fields are kept so details survive the round trip.

// Upstream sends null for fields that are not set yet
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

export const DeploymentSchema = z
  .object({
    id: z.string(),
    configurationId: optionalText,
    configurationName: optionalText,
    scenarioId: optionalText,
    status: optionalText,
    statusMessage: optionalText,
    targetStatus: optionalText,
    deploymentUrl: optionalText,
    createdAt: optionalText,
    modifiedAt: optionalText,
    details: z
      .record(z.unknown())
      .nullish()
      .transform((v) => v ?? undefined),
  })
  .passthrough();

export const DeploymentListSchema = z.object({
  count: z.number().int().optional(),
  resources: z.array(DeploymentSchema).default([]),
});

export const ConfigurationSchema = z
  .object({
    id: z.string(),
    name: z.string().default(""),
    executableId: z.string().default(""),
    scenarioId: z.string().default(""),
    createdAt: z.string().default(""),
  })
  .passthrough();

export const ConfigurationListSchema = z.object({
  count: z.number().int().optional(),
  resources: z.array(ConfigurationSchema).default([]),
});

export const OperationResultSchema = z
  .object({
    id: z.string(),
    message: z.string().default(""),
  })
  .passthrough();

// Request bodies accepted from callers

const BindingSchema = z.record(z.string());

export const ConfigurationRequestSchema = z.object({
  name: z.string().min(1, "name is required"),
  executableId: z.string().min(1, "executableId is required"),
  scenarioId: z.string().min(1, "scenarioId is required"),
  parameterBindings: z.array(BindingSchema).optional(),
  inputArtifactBindings: z.array(BindingSchema).optional(),
});

export const CreateDeploymentRequestSchema = z
  .object({
    tenant: z.string().min(1).optional(),
    configurationId: z.string().min(1).optional(),
    configurationRequest: ConfigurationRequestSchema.optional(),
    ttl: z.string().min(1).optional(),
  })
  .refine((req) => req.configurationId !== undefined || req.configurationRequest !== undefined, {
    message: "either configurationId or configurationRequest must be provided",
  })
  .refine((req) => req.configurationId === undefined || req.configurationRequest === undefined, {
    message: "configurationId and configurationRequest cannot both be provided",
  });

export const ModifyDeploymentRequestSchema = z
  .object({
    targetStatus: z.string().min(1).optional(),
    configurationId: z.string().min(1).optional(),
  })
  .refine((req) => req.targetStatus !== undefined || req.configurationId !== undefined, {
    message: "targetStatus or configurationId must be provided",
  });

export const CreateConfigurationBodySchema = ConfigurationRequestSchema.extend({
  tenant: z.string().min(1).optional(),
});
