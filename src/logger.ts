/**
 * Centralized Logger
 *
 * Provides a shared pino logger. Interactive terminals get pino-pretty output,
 * everything else (containers, log shippers, tests) gets JSON lines on stdout.
 */
import pino from "pino";

/**
 * Pretty output only makes sense for a human watching a terminal
 */
function shouldPrettyPrint(): boolean {
  const envValue = process.env.LOG_PRETTY?.toLowerCase();
  if (envValue === "false") return false;
  if (envValue === "true") return true;
  if (process.env.NODE_ENV === "test") return false;
  return process.stdout.isTTY ?? false;
}

/**
 * Create the logger for the current environment
 */
function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || "info";

  if (shouldPrettyPrint()) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }

  return pino({ level });
}

// Create and export the singleton logger
export const logger = createLogger();
