/**
 * @splitpact/node — Bootstrap.
 *
 * Loads config, builds the logger and the coordinator.
 */

import type { DestinationStream, Logger } from "pino";
import type { Clock } from "@splitpact/types";
import type { TokenLedger } from "@splitpact/settlement";
import { domainFromConfig, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { CoordinatorService } from "./services/coordinator-service.js";

export interface BootstrapOptions {
  readonly tokens: TokenLedger;

  /** Default: process.env */
  readonly env?: Record<string, string | undefined>;

  /** Raw JSON log sink; default stdout */
  readonly destination?: DestinationStream;

  readonly clock?: Clock;
}

export interface Coordinator {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly service: CoordinatorService;
}

/**
 * @throws {z.ZodError} if the environment is invalid
 */
export function bootstrap(options: BootstrapOptions): Coordinator {
  const config = loadConfig(options.env);
  const logger = createLogger(config, options.destination);
  const service = new CoordinatorService({
    domain: domainFromConfig(config),
    tokens: options.tokens,
    logger,
    clock: options.clock,
  });
  logger.info(
    { chainId: config.CHAIN_ID, coordinator: config.COORDINATOR_ADDRESS },
    "Coordinator started",
  );
  return { config, logger, service };
}
