import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { AppModule } from "./app.module.js";
import { ConfigService } from "./config/config.service.js";
import { GatewayErrorFilter } from "./filters/gateway-error.filter.js";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  app.useBodyParser("json", { limit: "10mb" });
  app.useGlobalFilters(new GatewayErrorFilter());
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get("port");
  await app.listen(port);
  Logger.log(`Inference gateway running on http://localhost:${String(port)}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), "Bootstrap");
  process.exit(1);
});
