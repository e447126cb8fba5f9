import { z } from "zod";
import { ConfigError } from "./errors.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const booleanFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

export const ServerConfigSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  LOG_PRETTY: booleanFlag.optional(),
  SURVEY_SERVER_NAME: z.string().min(1).default("survey-mapper"),
  SURVEY_SERVER_VERSION: z
    .string()
    .regex(/^\d+\.\d+\.\d+(?:[-+][\w.]+)?$/, "must be a semver version")
    .default("0.1.0"),
});

export type ServerConfig = {
  logLevel?: (typeof LOG_LEVELS)[number];
  logPretty?: boolean;
  serverName: string;
  serverVersion: string;
};

/**
 * Read server settings from environment variables.
 * Unset variables take their defaults; malformed ones throw `ConfigError`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = ServerConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  • ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${issues}`, {
      issues: result.error.issues,
    });
  }
  const parsed = result.data;
  const config: ServerConfig = {
    serverName: parsed.SURVEY_SERVER_NAME,
    serverVersion: parsed.SURVEY_SERVER_VERSION,
  };
  if (parsed.LOG_LEVEL !== undefined) config.logLevel = parsed.LOG_LEVEL;
  if (parsed.LOG_PRETTY !== undefined) config.logPretty = parsed.LOG_PRETTY;
  return config;
}
