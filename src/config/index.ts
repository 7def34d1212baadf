/**
 * Config Module Exports
 */

// Services
export { AppConfigService } from "./config.service";
export type { ApplicationConfig, SecurityConfig } from "./config.service";

// Module
export { ConfigModule } from "./config.module";

// Environment
export { ENV, loadEnvironment } from "./environment.constants";
export type { Environment } from "./environment.constants";
