import axios, { type AxiosInstance } from "axios";
import type { FetchOutcome, SchemaVariant } from "../types/sensor";
import { createLogger } from "../utils/logger";

const log = createLogger("fetch");

export const LEGACY_HOST = "www.purpleair.com";
export const CURRENT_HOST = "api.purpleair.com";

export const DEFAULT_CURRENT_FIELDS = [
  "name",
  "pm2.5",
  "pm10.0",
  "temperature",
  "humidity",
  "pressure",
  "last_seen",
] as const;

const USER_AGENT = "purple-air-exporter/1.0";

export function urlFor(variant: SchemaVariant, unitId: string): string {
  switch (variant.kind) {
    case "legacy":
      return `https://${variant.host}/json?show=${encodeURIComponent(unitId)}`;
    case "current": {
      const token = encodeURIComponent(variant.apiToken);
      return `https://${variant.host}/v1/sensors/${encodeURIComponent(
        unitId
      )}?token=${token}&fields=${variant.fields.join(",")}`;
    }
  }
}

// Keep tokens out of the logs.
export function maskUrl(url: string): string {
  return url.replace(/([?&]token=)[^&]*/, "$1***");
}

export interface SensorFetcherOptions {
  timeoutMs?: number;
  http?: AxiosInstance;
}

/**
 * Issues one GET per call and folds every outcome into a `FetchOutcome`.
 * Nothing is retried here; the next tick is the retry.
 */
export class SensorFetcher {
  private readonly http: AxiosInstance;

  constructor(options: SensorFetcherOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 10000,
        headers: {
          Accept: "application/json",
          "User-Agent": USER_AGENT,
        },
      });
  }

  async fetch(url: string): Promise<FetchOutcome> {
    log.debug(`Fetching ${maskUrl(url)}`);

    try {
      const response = await this.http.get<string>(url, {
        // Status codes are classified below rather than thrown.
        validateStatus: null,
        // The parser owns JSON decoding.
        responseType: "text",
        transformResponse: (data: unknown) => data,
      });

      if (response.status === 429) {
        return { kind: "throttled" };
      }

      if (response.status < 200 || response.status >= 300) {
        return {
          kind: "failure",
          status: response.status,
          reason: `HTTP ${response.status}${
            response.statusText ? ` ${response.statusText}` : ""
          }`,
        };
      }

      return { kind: "success", body: bodyToString(response.data) };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        return {
          kind: "failure",
          reason: error.code ? `${error.code}: ${error.message}` : error.message,
        };
      }
      return {
        kind: "failure",
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

function bodyToString(data: unknown): string {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}
