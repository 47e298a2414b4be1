import { Module } from "@nestjs/common";
import { CredentialsModule } from "../credentials/credentials.module.js";
import { InMemoryTokenStore } from "./in-memory-token.store.js";
import { TenantApiClient } from "./tenant-api.client.js";
import { TokenCacheService } from "./token-cache.service.js";
import { TOKEN_STORE } from "./token.types.js";

@Module({
  imports: [CredentialsModule],
  providers: [TokenCacheService, TenantApiClient, { provide: TOKEN_STORE, useClass: InMemoryTokenStore }],
  exports: [TokenCacheService, TenantApiClient],
})
export class TokenModule {}
