export { ConfigModule } from "./config.module.js";
export { type Config, CONFIG_DEFAULTS, ConfigService } from "./config.service.js";
