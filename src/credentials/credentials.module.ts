import { Module } from "@nestjs/common";
import { CredentialStoreService } from "./credential-store.service.js";
import { CREDENTIAL_SOURCE } from "./credentials.types.js";
import { EnvCredentialSource } from "./env-credential.source.js";

@Module({
  providers: [
    CredentialStoreService,
    { provide: CREDENTIAL_SOURCE, useClass: EnvCredentialSource },
  ],
  exports: [CredentialStoreService],
})
export class CredentialsModule {}
