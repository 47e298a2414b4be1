import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
  Req,
  UseGuards,
} from "@nestjs/common";
import { type AuthenticatedRequest, IdentityGuard } from "../auth/identity.guard.js";
import { parseInput } from "../common/validation.utils.js";
import { TenantResolverService } from "../tenant/tenant-resolver.service.js";
import {
  CreateDeploymentRequestSchema,
  ModifyDeploymentRequestSchema,
} from "./deployments.schema.js";
import { DeploymentsService } from "./deployments.service.js";
import type { Deployment, DeploymentListing, OperationResult } from "./deployments.types.js";

@Controller("v1/deployments")
@UseGuards(IdentityGuard)
export class DeploymentsController {
  constructor(
    private readonly deploymentsService: DeploymentsService,
    private readonly tenantResolver: TenantResolverService,
  ) {}

  /**
   * Deployments across every tenant the caller can see
   * GET /v1/deployments
   */
  @Get()
  async list(@Req() req: AuthenticatedRequest): Promise<DeploymentListing> {
    const scope = await this.tenantResolver.resolve(req.identity);
    return this.deploymentsService.listDeployments(scope);
  }

  @Get(":id")
  async get(
    @Req() req: AuthenticatedRequest,
    @Param("id") id: string,
    @Query("tenant") tenant?: string,
  ): Promise<Deployment> {
    const tenantId = await this.deploymentsService.ownerOf(req.identity, id, tenant);
    return this.deploymentsService.getDeploymentDetails(tenantId, id);
  }

  /**
   * Deploy an existing configuration, or create one first
   * POST /v1/deployments
   */
  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown): Promise<OperationResult> {
    const request = parseInput(CreateDeploymentRequestSchema, body);
    const tenantId = await this.tenantResolver.resolveTarget(req.identity, request.tenant);
    return this.deploymentsService.createDeployment(tenantId, request);
  }

  @Patch(":id")
  @HttpCode(HttpStatus.ACCEPTED)
  async update(
    @Req() req: AuthenticatedRequest,
    @Param("id") id: string,
    @Body() body: unknown,
    @Query("tenant") tenant?: string,
  ): Promise<OperationResult> {
    const request = parseInput(ModifyDeploymentRequestSchema, body);
    const tenantId = await this.deploymentsService.ownerOf(req.identity, id, tenant);
    return this.deploymentsService.updateDeployment(tenantId, id, request);
  }

  @Delete(":id")
  @HttpCode(HttpStatus.ACCEPTED)
  async remove(
    @Req() req: AuthenticatedRequest,
    @Param("id") id: string,
    @Query("tenant") tenant?: string,
  ): Promise<OperationResult> {
    const tenantId = await this.deploymentsService.ownerOf(req.identity, id, tenant);
    return this.deploymentsService.deleteDeployment(tenantId, id);
  }
}
