/**
 * Structured logging via pino.
 */

import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

/**
 * Create the package logger. Writes to stdout unless `stderr` is set, which
 * the CLI uses to keep log lines out of command output.
 */
export const makeLogger = (
  level: LogLevel = "info",
  options?: { stderr?: boolean }
): Logger =>
  options?.stderr
    ? pino({ name: "didfeed", level }, pino.destination(2))
    : pino({ name: "didfeed", level });
