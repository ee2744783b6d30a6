/**
 * Structured Logging
 *
 * Every platform component logs through the contracts `Logger`. Lines are
 * single JSON objects so they can be shipped as-is. Warnings and errors are
 * also forwarded to the observability provider.
 */

import type { Logger } from "@schemata/contracts";
import { captureMessage } from "../observability/index.js";

/**
 * Creates a simple structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(JSON.stringify({ level: "info", context, message, ...data }));
    },
    warn(message, data) {
      console.warn(JSON.stringify({ level: "warn", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(JSON.stringify({ level: "error", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(JSON.stringify({ level: "debug", context, message, ...data }));
      }
    },
  };
}

/** Formats an unknown thrown value for a log line */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
