import { Body, Controller, Get, Post, Query, Req, UseGuards } from "@nestjs/common";
import { type AuthenticatedRequest, IdentityGuard } from "../auth/identity.guard.js";
import { parseInput } from "../common/validation.utils.js";
import { TenantResolverService } from "../tenant/tenant-resolver.service.js";
import { CreateConfigurationBodySchema } from "./deployments.schema.js";
import { DeploymentsService } from "./deployments.service.js";
import type { ConfigurationList, OperationResult } from "./deployments.types.js";

@Controller("v1/configurations")
@UseGuards(IdentityGuard)
export class ConfigurationsController {
  constructor(
    private readonly deploymentsService: DeploymentsService,
    private readonly tenantResolver: TenantResolverService,
  ) {}

  @Get()
  async list(
    @Req() req: AuthenticatedRequest,
    @Query("tenant") tenant?: string,
  ): Promise<ConfigurationList> {
    const tenantId = await this.tenantResolver.resolveTarget(req.identity, tenant);
    return this.deploymentsService.listConfigurations(tenantId);
  }

  @Post()
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown): Promise<OperationResult> {
    const { tenant, ...request } = parseInput(CreateConfigurationBodySchema, body);
    const tenantId = await this.tenantResolver.resolveTarget(req.identity, tenant);
    return this.deploymentsService.createConfiguration(tenantId, request);
  }
}
