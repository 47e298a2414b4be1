import type { z } from "zod";
import type { ListModelsQuerySchema, ModelSchema, ModelVersionSchema } from "./models.schema.js";

export type Model = z.infer<typeof ModelSchema>;
export type ModelVersion = z.infer<typeof ModelVersionSchema>;
export type ListModelsQuery = z.infer<typeof ListModelsQuerySchema>;

export interface ModelsListResponse {
  count: number;
  resources: Model[];
}
