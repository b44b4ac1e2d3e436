import pino from "pino";
import type { LevelWithSilent, Logger as PinoLogger } from "pino";

/**
 * The slice of pino the engine writes through. Components accept any object
 * with these methods so tests can pass spies.
 */
export type Logger = Pick<PinoLogger, "debug" | "info" | "warn" | "error">;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LevelWithSilent[];
export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Root logger. Pass `toStderr` when stdout carries program output.
 */
export const createLogger = (level: LogLevel = "info", toStderr = false): PinoLogger =>
  toStderr ? pino({ name: "soilscope", level }, pino.destination(2)) : pino({ name: "soilscope", level });

export const silentLogger: Logger = pino({ level: "silent" });
