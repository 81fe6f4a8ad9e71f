import { z } from "zod";
import { READING_METRICS } from "../types/sensor";
import type {
  ParseOutcome,
  ReadingMetric,
  ReadingValues,
  SchemaVariant,
  SensorReading,
} from "../types/sensor";

type FieldTable = Readonly<Record<ReadingMetric, string>>;

// Payload key for each gauge, per schema variant.
export const LEGACY_FIELDS: FieldTable = {
  pm2_5: "pm2_5_atm",
  pm10_0: "pm10_0_atm",
  temp_f: "temp_f",
  humidity: "humidity",
  pressure: "pressure",
  last_seen_seconds: "LastSeen",
};

export const CURRENT_FIELDS: FieldTable = {
  pm2_5: "pm2.5",
  pm10_0: "pm10.0",
  temp_f: "temperature",
  humidity: "humidity",
  pressure: "pressure",
  last_seen_seconds: "last_seen",
};

const DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// The legacy endpoint sends most numbers as strings. Only decimal notation
// counts; "0x10" or "Infinity" are not readings.
const numericField = z
  .union([z.number(), z.string().trim().regex(DECIMAL).pipe(z.coerce.number())])
  .pipe(z.number().finite());

const idField = z.union([z.string(), z.number()]).transform(String);

const sensorObject = z.record(z.string(), z.unknown());

const legacyEnvelope = z.object({ results: z.array(z.unknown()) });

const currentEnvelope = z.object({ sensor: sensorObject });

function extractValues(
  data: Record<string, unknown>,
  fields: FieldTable
): ReadingValues {
  const values: ReadingValues = {};
  for (const metric of READING_METRICS) {
    const key = fields[metric];
    if (!(key in data)) continue;
    const parsed = numericField.safeParse(data[key]);
    if (parsed.success) {
      values[metric] = parsed.data;
    }
  }
  return values;
}

function readString(data: Record<string, unknown>, key: string): string {
  const parsed = idField.safeParse(data[key]);
  return parsed.success ? parsed.data : "";
}

function decode(body: string): { ok: true; json: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, json: JSON.parse(body) };
  } catch (error) {
    return {
      ok: false,
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

function parseLegacy(json: unknown, unitId: string): ParseOutcome {
  const envelope = legacyEnvelope.safeParse(json);
  if (!envelope.success) {
    return {
      ok: false,
      error: {
        kind: "unexpected_shape",
        message: "legacy payload has no 'results' array",
      },
    };
  }

  const entries: Record<string, unknown>[] = [];
  for (const entry of envelope.data.results) {
    const parsed = sensorObject.safeParse(entry);
    if (parsed.success) entries.push(parsed.data);
  }

  // Units usually hold two sensors and only the parent carries a label.
  // The first non-empty one names every sensor in the poll.
  const label =
    entries.map((entry) => readString(entry, "Label")).find((l) => l !== "") ?? "";

  const readings: SensorReading[] = entries.map((entry) => ({
    unitId,
    sensorId: readString(entry, "ID"),
    label,
    values: extractValues(entry, LEGACY_FIELDS),
  }));

  return { ok: true, readings };
}

function parseCurrent(json: unknown, unitId: string): ParseOutcome {
  const envelope = currentEnvelope.safeParse(json);
  if (!envelope.success) {
    return {
      ok: false,
      error: {
        kind: "unexpected_shape",
        message: "payload has no 'sensor' object",
      },
    };
  }

  const sensor = envelope.data.sensor;
  return {
    ok: true,
    readings: [
      {
        unitId,
        sensorId: readString(sensor, "sensor_index"),
        label: readString(sensor, "name"),
        values: extractValues(sensor, CURRENT_FIELDS),
      },
    ],
  };
}

/**
 * Turn a raw response body into readings. Missing or non-numeric fields are
 * left out of `values`; only an undecodable body or a wrong envelope fails.
 */
export function parseSensorPayload(
  body: string,
  variant: SchemaVariant,
  unitId: string
): ParseOutcome {
  const decoded = decode(body);
  if (!decoded.ok) {
    return {
      ok: false,
      error: { kind: "invalid_json", message: decoded.message },
    };
  }

  switch (variant.kind) {
    case "legacy":
      return parseLegacy(decoded.json, unitId);
    case "current":
      return parseCurrent(decoded.json, unitId);
  }
}
