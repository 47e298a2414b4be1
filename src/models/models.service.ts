import { Injectable } from "@nestjs/common";
import { UpstreamRequestFailedError } from "../errors/index.js";
import { TenantApiClient } from "../token/tenant-api.client.js";
import { decodeJson } from "../upstream/decode.js";
import { ModelsListSchema } from "./models.schema.js";
import type { ModelsListResponse } from "./models.types.js";

@Injectable()
export class ModelsService {
  constructor(private readonly api: TenantApiClient) {}

  /**
   * Models a tenant can deploy for the given scenario
   */
  async listModels(tenantId: string, scenarioId: string): Promise<ModelsListResponse> {
    const response = await this.api.request(tenantId, {
      method: "GET",
      target: `/v2/lm/scenarios/${encodeURIComponent(scenarioId)}/models`,
    });
    if (response.status !== 200) {
      throw new UpstreamRequestFailedError(response.status, response.body);
    }

    const list = decodeJson(response.body, ModelsListSchema, "models list");
    return {
      count: list.count ?? list.resources.length,
      resources: list.resources,
    };
  }
}
