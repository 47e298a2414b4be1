import { Controller, Get, Req, UseGuards } from "@nestjs/common";
import { type AuthenticatedRequest, IdentityGuard } from "../auth/identity.guard.js";
import { TenantResolverService } from "./tenant-resolver.service.js";
import type { MeResponse } from "./tenant.types.js";

@Controller("v1/me")
@UseGuards(IdentityGuard)
export class TenantController {
  constructor(private readonly tenantResolver: TenantResolverService) {}

  /**
   * Tenants the caller can currently use
   * GET /v1/me
   */
  @Get()
  async getMe(@Req() req: AuthenticatedRequest): Promise<MeResponse> {
    return {
      user: req.identity.username,
      tenants: await this.tenantResolver.usableTenants(req.identity),
    };
  }
}
