import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module.js";
import { TenantModule } from "../tenant/tenant.module.js";
import { TokenModule } from "../token/token.module.js";
import { ConfigurationsController } from "./configurations.controller.js";
import { DeploymentsController } from "./deployments.controller.js";
import { DeploymentsService } from "./deployments.service.js";

@Module({
  imports: [AuthModule, TenantModule, TokenModule],
  controllers: [DeploymentsController, ConfigurationsController],
  providers: [DeploymentsService],
  exports: [DeploymentsService],
})
export class DeploymentsModule {}
