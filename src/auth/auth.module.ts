import { Module } from "@nestjs/common";
import { DataModule } from "../data/data.module.js";
import { IdentityGuard } from "./identity.guard.js";

@Module({
  imports: [DataModule],
  providers: [IdentityGuard],
  exports: [IdentityGuard, DataModule],
})
export class AuthModule {}
