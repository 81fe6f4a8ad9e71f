import * as dotenv from "dotenv";
import { resolve } from "node:path";
import { z } from "zod";
import {
  CURRENT_HOST,
  DEFAULT_CURRENT_FIELDS,
  LEGACY_HOST,
} from "../services/sensor-fetch-service";
import type { SchemaVariant } from "../types/sensor";
import { LOG_LEVELS, type LogLevel } from "../utils/logger";

export interface AppConfig {
  intervalMs: number;
  sensorIds: string[];
  promPort: number;
  logLevel: LogLevel;
  requestTimeoutMs: number;
  variant: SchemaVariant;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

// Node timers hold a signed 32-bit millisecond delay; anything longer fires
// after 1ms.
export const MAX_INTERVAL_S = Math.floor(2 ** 31 / 1000) - 1;

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const sensorIdList = z
  .string({ required_error: "PAS_SENSOR_IDS is required" })
  .transform((raw) =>
    raw
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id !== "")
  )
  .pipe(
    z
      .array(z.string().regex(/^[1-9]\d*$/, "sensor IDs must be positive integers"))
      .min(1, "PAS_SENSOR_IDS must list at least one sensor")
  );

const envSchema = z
  .object({
    PAS_SENSOR_IDS: z.preprocess(blankToUndefined, sensorIdList),
    PAS_INTERVAL_S: z.preprocess(
      blankToUndefined,
      z.coerce.number().positive().max(MAX_INTERVAL_S).default(30)
    ),
    PAS_PROM_PORT: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().min(0).max(65535).default(9101)
    ),
    PAS_LOGGING: z.preprocess(
      (value) =>
        typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value,
      z.enum(LOG_LEVELS).default("info")
    ),
    PAS_API_VARIANT: z.preprocess(
      blankToUndefined,
      z.enum(["legacy", "current"]).default("legacy")
    ),
    PAS_API_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
    PAS_API_HOST: z.preprocess(blankToUndefined, z.string().optional()),
    PAS_REQUEST_TIMEOUT_MS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().positive().default(10000)
    ),
  })
  .superRefine((env, ctx) => {
    if (env.PAS_API_VARIANT === "current" && !env.PAS_API_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PAS_API_TOKEN"],
        message: "PAS_API_TOKEN is required when PAS_API_VARIANT is 'current'",
      });
    }
  });

function toVariant(env: z.infer<typeof envSchema>): SchemaVariant {
  if (env.PAS_API_VARIANT === "current") {
    return {
      kind: "current",
      host: env.PAS_API_HOST ?? CURRENT_HOST,
      apiToken: env.PAS_API_TOKEN ?? "",
      fields: DEFAULT_CURRENT_FIELDS,
    };
  }
  return { kind: "legacy", host: env.PAS_API_HOST ?? LEGACY_HOST };
}

/** Validate the environment. Throws `ConfigError` listing every problem. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }

  const parsed = result.data;
  return {
    intervalMs: parsed.PAS_INTERVAL_S * 1000,
    sensorIds: parsed.PAS_SENSOR_IDS,
    promPort: parsed.PAS_PROM_PORT,
    logLevel: parsed.PAS_LOGGING,
    requestTimeoutMs: parsed.PAS_REQUEST_TIMEOUT_MS,
    variant: toVariant(parsed),
  };
}

export function envFileCandidates(cwd: string = process.cwd()): string[] {
  return [
    resolve(cwd, ".env"),
    resolve(cwd, "..", ".env"),
    resolve(__dirname, ".env"),
  ];
}

/**
 * Load the first `.env` file found into `process.env`. Variables already set
 * in the environment win. Returns the path used, or null.
 */
export function loadEnvFile(cwd: string = process.cwd()): string | null {
  for (const path of envFileCandidates(cwd)) {
    const result = dotenv.config({ path });
    if (result.parsed) {
      return path;
    }
  }
  return null;
}
