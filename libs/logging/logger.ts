import pino from "pino";
import { resolveLogLevel } from "../bootstrap/config.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: resolveLogLevel(process.env),
  base: {
    system: "dualwire"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger tagged with the emitting engine component.
 */
export function getModuleLogger(module: string) {
  return logger.child({ module });
}
