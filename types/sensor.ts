// Gauges recorded straight from a sensor payload. The names double as the
// Prometheus metric suffixes.
export const READING_METRICS = [
  "pm2_5",
  "pm10_0",
  "temp_f",
  "humidity",
  "pressure",
  "last_seen_seconds",
] as const;

export type ReadingMetric = (typeof READING_METRICS)[number];

export type ReadingValues = Partial<Record<ReadingMetric, number>>;

export interface SensorReading {
  /** ID used to request the endpoint (a PurpleAir unit may hold several sensors). */
  unitId: string;
  sensorId: string;
  label: string;
  values: ReadingValues;
}

export type AqiPollutant = "pm2_5" | "pm10_0";

export type AqiConversion = "" | "AQandU";

export interface AqiResult {
  value: number;
  conversion: AqiConversion;
}

export type BreakpointTable = ReadonlyArray<readonly [pm: number, aqi: number]>;

/**
 * PurpleAir deployments answer in one of two shapes. The variant is chosen
 * once at startup and carries everything needed to build its request URL.
 */
export type SchemaVariant =
  | { kind: "legacy"; host: string }
  | { kind: "current"; host: string; apiToken: string; fields: readonly string[] };

export type FetchOutcome =
  | { kind: "success"; body: string }
  | { kind: "throttled" }
  | { kind: "failure"; reason: string; status?: number };

export interface ParseFailure {
  kind: "invalid_json" | "unexpected_shape";
  message: string;
}

export type ParseOutcome =
  | { ok: true; readings: SensorReading[] }
  | { ok: false; error: ParseFailure };
