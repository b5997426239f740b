import type { Logger } from "./types.js";

/** Create a console-based logger with `[retry-kit]` prefix. Pass your own Logger to override. */
export function createDefaultLogger(): Logger {
  return {
    debug(msg, data) {
      console.debug(`[retry-kit] ${msg}`, data ?? "");
    },
    info(msg, data) {
      console.info(`[retry-kit] ${msg}`, data ?? "");
    },
    warn(msg, data) {
      console.warn(`[retry-kit] ${msg}`, data ?? "");
    },
    error(msg, data) {
      console.error(`[retry-kit] ${msg}`, data ?? "");
    },
  };
}
