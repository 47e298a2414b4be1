import { Module } from "@nestjs/common";
import { AuthModule } from "./auth/index.js";
import { ConfigModule } from "./config/index.js";
import { CredentialsModule } from "./credentials/index.js";
import { DataModule } from "./data/index.js";
import { DeploymentsModule } from "./deployments/index.js";
import { HealthController } from "./health/health.controller.js";
import { InferenceModule } from "./inference/index.js";
import { ModelsModule } from "./models/index.js";
import { TenantModule } from "./tenant/index.js";
import { TokenModule } from "./token/index.js";
import { UpstreamModule } from "./upstream/index.js";

@Module({
  imports: [
    ConfigModule,
    UpstreamModule,
    DataModule,
    AuthModule,
    CredentialsModule,
    TokenModule,
    TenantModule,
    DeploymentsModule,
    ModelsModule,
    InferenceModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
