/**
 * Logger utility.
 * pino with structured JSON output on stderr; stdout stays free for the
 * stdio MCP transport.
 */

import { pino, destination, type Logger, type LoggerOptions as PinoOptions } from "pino";

export type LoggerOptions = {
  level?: string;
  name?: string;
  pretty?: boolean;
};

function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) return envLevel;
  if (process.env.NODE_ENV === "production") return "info";
  if (process.env.NODE_ENV === "development") return "debug";
  // Library use and tests stay quiet unless asked
  return "warn";
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === "true";
  }
  return process.env.NODE_ENV === "development";
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional overrides
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? getDefaultLogLevel();
  const pretty = options.pretty ?? isPrettyMode();

  const baseOptions: PinoOptions = {
    name: options.name ?? name,
    level,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  };

  if (pretty) {
    // pino-pretty is a devDependency; only used outside production
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, destination(2));
}

/** Root logger */
export const logger = createLogger("survey-mapper");

export function childLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
