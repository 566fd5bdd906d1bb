/**
 * @cardkeep/registry — Logging.
 *
 * pino for JSON-structured logs. Components take an optional Logger and
 * fall back to a silent one, so embedding the registry never prints
 * unless the host asks for it.
 */

import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Human-readable output through pino-pretty (development only). */
  readonly pretty?: boolean | undefined;
  readonly name?: string | undefined;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    name: options.name ?? "cardkeep",
    ...(options.pretty === true ? { transport: { target: "pino-pretty" } } : {}),
  });
}

const SILENT_LOGGER: Logger = pino({ level: "silent" });

/** The shared logger that components fall back to. Writes nothing. */
export function silentLogger(): Logger {
  return SILENT_LOGGER;
}
