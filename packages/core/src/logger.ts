/**
 * Console logging with a `[fieldmap:<scope>]` prefix.
 *
 * `debug` output is gated on the `debug` config option (`FIELDMAP_DEBUG=1`);
 * warnings are always written.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[fieldmap:${scope}]`;
  return {
    scope,
    debug(message) {
      if (!config.settings().debug) return;
      console.debug(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
  };
}
