import { z } from "zod";

import type { LogLevel } from "../lib/logger.js";

const requiredString = z.string().trim().min(1, "must be set");

const envSchema = z.object({
  OPENWEATHER_API_KEY: requiredString,
  AWS_BUCKET_NAME: requiredString,
  OPENWEATHER_BASE_URL: z.string().url().default("https://api.openweathermap.org/data/2.5"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export interface AppConfig {
  readonly apiKey: string;
  readonly bucketName: string;
  readonly weatherBaseUrl: string;
  readonly logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly variables: string[], detail: string) {
    super(`Invalid environment: ${detail}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigError(variables, detail);
  }

  return Object.freeze({
    apiKey: parsed.data.OPENWEATHER_API_KEY,
    bucketName: parsed.data.AWS_BUCKET_NAME,
    weatherBaseUrl: parsed.data.OPENWEATHER_BASE_URL,
    logLevel: parsed.data.LOG_LEVEL
  });
}
