import { Global, Module } from "@nestjs/common";
import { UpstreamHttpClient } from "./upstream-http.client.js";

@Global()
@Module({
  providers: [UpstreamHttpClient],
  exports: [UpstreamHttpClient],
})
export class UpstreamModule {}
