/**
 * Scoped console logging.
 *
 * Debug output is only written when `config.get("debug")` is true
 * (e.g. `SIMPLECAS_DEBUG=1`).
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[simplecas:${scope}]`;
  return {
    scope,
    debug(message, ...details) {
      if (!config.get("debug")) return;
      console.debug(`${prefix} ${message}`, ...details);
    },
  };
}
