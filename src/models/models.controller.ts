import { Controller, Get, Query, Req, UseGuards } from "@nestjs/common";
import { type AuthenticatedRequest, IdentityGuard } from "../auth/identity.guard.js";
import { parseInput } from "../common/validation.utils.js";
import { TenantResolverService } from "../tenant/tenant-resolver.service.js";
import { ListModelsQuerySchema } from "./models.schema.js";
import { ModelsService } from "./models.service.js";
import type { ModelsListResponse } from "./models.types.js";

@Controller("v1/models")
@UseGuards(IdentityGuard)
export class ModelsController {
  constructor(
    private readonly modelsService: ModelsService,
    private readonly tenantResolver: TenantResolverService,
  ) {}

  /**
   * GET /v1/models?scenarioId=&tenant=
   */
  @Get()
  async listModels(
    @Req() req: AuthenticatedRequest,
    @Query() query: Record<string, unknown>,
  ): Promise<ModelsListResponse> {
    const { scenarioId, tenant } = parseInput(ListModelsQuerySchema, query);
    const tenantId = await this.tenantResolver.resolveTarget(req.identity, tenant);
    return this.modelsService.listModels(tenantId, scenarioId);
  }
}
