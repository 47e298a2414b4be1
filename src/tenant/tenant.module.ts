import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module.js";
import { CredentialsModule } from "../credentials/credentials.module.js";
import { TenantResolverService } from "./tenant-resolver.service.js";
import { TenantController } from "./tenant.controller.js";

@Module({
  imports: [AuthModule, CredentialsModule],
  controllers: [TenantController],
  providers: [TenantResolverService],
  exports: [TenantResolverService],
})
export class TenantModule {}
