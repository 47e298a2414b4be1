import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module.js";
import { DeploymentsModule } from "../deployments/deployments.module.js";
import { TenantModule } from "../tenant/tenant.module.js";
import { TokenModule } from "../token/token.module.js";
import { InferenceController } from "./inference.controller.js";
import { InferenceService } from "./inference.service.js";

@Module({
  imports: [AuthModule, TenantModule, TokenModule, DeploymentsModule],
  controllers: [InferenceController],
  providers: [InferenceService],
  exports: [InferenceService],
})
export class InferenceModule {}
