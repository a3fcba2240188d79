/* eslint-disable no-console */
import type { Logger } from "./core.js";

export interface ConsoleLoggerOptions {
  /** Defaults to whether `DEBUG` is set in the environment */
  readonly debug?: boolean;
}

export function createConsoleLogger(
  namespace: string,
  options: ConsoleLoggerOptions = {},
): Required<Logger> {
  const prefix = `[${namespace}]`;
  const debugEnabled = options.debug ?? Boolean(process.env["DEBUG"]);

  return {
    info(message: string, meta?: unknown): void {
      console.info(prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      console.warn(prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(prefix, message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (debugEnabled) {
        console.debug(prefix, message, meta ?? "");
      }
    },
  } satisfies Required<Logger>;
}
