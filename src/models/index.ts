export { ModelsModule } from "./models.module.js";
export { ModelsService } from "./models.service.js";
export type { Model, ModelsListResponse, ModelVersion } from "./models.types.js";
