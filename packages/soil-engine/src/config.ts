import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";

export const DEFAULT_OPENWEATHER_BASE_URL = "https://api.openweathermap.org/data/2.5";
export const DEFAULT_NASA_POWER_BASE_URL = "https://power.larc.nasa.gov/api/temporal/daily/point";
export const DEFAULT_SOILGRIDS_BASE_URL = "https://rest.isric.org/soilgrids/v2.0/properties/query";
export const DEFAULT_USER_AGENT = "soilscope/0.1.0";

const timeoutMs = z.coerce.number().int().positive().default(30_000);

const apiKey = z.string().min(1).optional();

const SourceConfigSchema = (baseUrl: string) =>
  z.object({
    baseUrl: z.string().url().default(baseUrl),
    timeoutMs
  });

export const SoilscopeConfigSchema = z.object({
  weather: SourceConfigSchema(DEFAULT_OPENWEATHER_BASE_URL).extend({ apiKey }),
  atmospheric: SourceConfigSchema(DEFAULT_NASA_POWER_BASE_URL).extend({
    apiKey,
    windowDays: z.coerce.number().int().min(1).max(31).default(7)
  }),
  soil: SourceConfigSchema(DEFAULT_SOILGRIDS_BASE_URL),
  retry: z.object({
    maxRetries: z.coerce.number().int().min(1).max(10).default(3),
    baseDelayMs: z.coerce.number().int().min(0).default(2_000)
  }),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  logLevel: z.enum(LOG_LEVELS).default("info")
});

export type SoilscopeConfig = z.infer<typeof SoilscopeConfigSchema>;

export type EnvRecord = Record<string, string | undefined>;

const read = (env: EnvRecord, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

export const parseConfig = (input: unknown): SoilscopeConfig => {
  const parsed = SoilscopeConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
};

/**
 * Builds the engine configuration from environment variables. A shared
 * SOILSCOPE_TIMEOUT_MS applies to every source unless a per-source timeout is set.
 */
export const loadConfig = (env: EnvRecord = process.env): SoilscopeConfig => {
  const sharedTimeout = read(env, "SOILSCOPE_TIMEOUT_MS");
  return parseConfig({
    weather: {
      baseUrl: read(env, "OPENWEATHER_BASE_URL"),
      apiKey: read(env, "OPENWEATHER_API_KEY"),
      timeoutMs: read(env, "OPENWEATHER_TIMEOUT_MS") ?? sharedTimeout
    },
    atmospheric: {
      baseUrl: read(env, "NASA_POWER_BASE_URL"),
      apiKey: read(env, "NASA_API_KEY"),
      timeoutMs: read(env, "NASA_POWER_TIMEOUT_MS") ?? sharedTimeout,
      windowDays: read(env, "NASA_POWER_WINDOW_DAYS")
    },
    soil: {
      baseUrl: read(env, "SOILGRIDS_BASE_URL"),
      timeoutMs: read(env, "SOILGRIDS_TIMEOUT_MS") ?? sharedTimeout
    },
    retry: {
      maxRetries: read(env, "SOILSCOPE_MAX_RETRIES"),
      baseDelayMs: read(env, "SOILSCOPE_BASE_DELAY_MS")
    },
    userAgent: read(env, "SOILSCOPE_USER_AGENT"),
    logLevel: read(env, "SOILSCOPE_LOG_LEVEL")
  });
};
