/**
 * @splitpact/node — Coordinator for split settlements.
 *
 * @packageDocumentation
 */

export { CoordinatorService } from "./services/coordinator-service.js";
export type { CoordinatorServiceConfig } from "./services/coordinator-service.js";
export { loadConfig, domainFromConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { bootstrap } from "./bootstrap.js";
export type { BootstrapOptions, Coordinator } from "./bootstrap.js";
