import { z } from "zod";

export enum InferenceProtocol {
  Anthropic = "anthropic",
  Gpt = "gpt",
  Gemini = "gemini",
  Orchestration = "orchestration",
}

// A malformed variant must not hide a valid one
const BackendDetailsSchema = z
  .object({ model: z.object({ name: z.string().min(1) }) })
  .optional()
  .catch(undefined);

const DeploymentDetailsSchema = z.object({
  resources: z.object({
    backend_details: BackendDetailsSchema,
    backendDetails: BackendDetailsSchema,
  }),
});

const GPT_MARKERS = ["gpt", "o1", "o3", "openai"];

/**
 * Upstream wire protocol for a deployment. Case-insensitive substring rules,
 * checked in order: orchestration scenario, gemini model, GPT family, else Anthropic.
 */
export function classifyProtocol(scenarioId: string, modelName: string): InferenceProtocol {
  const scenario = scenarioId.toLowerCase();
  const model = modelName.toLowerCase();

  if (scenario.includes("orchestration")) {
    return InferenceProtocol.Orchestration;
  }
  if (model.includes("gemini")) {
    return InferenceProtocol.Gemini;
  }
  if (GPT_MARKERS.some((marker) => model.includes(marker))) {
    return InferenceProtocol.Gpt;
  }
  return InferenceProtocol.Anthropic;
}

/**
 * Model name from deployment details, under either
 * `resources.backend_details.model.name` or `resources.backendDetails.model.name`.
 */
export function extractModelName(details: unknown): string | undefined {
  const parsed = DeploymentDetailsSchema.safeParse(details);
  if (!parsed.success) {
    return undefined;
  }
  const { backend_details, backendDetails } = parsed.data.resources;
  return backend_details?.model.name ?? backendDetails?.model.name;
}
