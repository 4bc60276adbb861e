/**
 * @splitpact/node — Logger construction.
 *
 * JSON lines through pino; pino-pretty in development.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

/**
 * Create the coordinator's root logger.
 *
 * A destination, when given, receives raw JSON lines and disables the
 * pretty transport (tests read the lines back).
 */
export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
