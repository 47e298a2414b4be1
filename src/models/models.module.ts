import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module.js";
import { TenantModule } from "../tenant/tenant.module.js";
import { TokenModule } from "../token/token.module.js";
import { ModelsController } from "./models.controller.js";
import { ModelsService } from "./models.service.js";

@Module({
  imports: [AuthModule, TenantModule, TokenModule],
  controllers: [ModelsController],
  providers: [ModelsService],
  exports: [ModelsService],
})
export class ModelsModule {}
