import { Counter, Gauge, Registry } from "prom-client";
import type {
  AqiPollutant,
  AqiResult,
  ReadingMetric,
  SensorReading,
} from "../types/sensor";

export const STAT_PREFIX = "purpleair_";

const SENSOR_LABELS = ["unit_id", "sensor_id", "label"] as const;
const AQI_LABELS = ["unit_id", "sensor_id", "label", "conversion"] as const;

type SensorLabel = (typeof SENSOR_LABELS)[number];
type AqiLabel = (typeof AQI_LABELS)[number];

const READING_HELP: Record<ReadingMetric, string> = {
  pm2_5: "2.5 micron particulate matter (ug/m^3)",
  pm10_0: "10 micron particulate matter (ug/m^3)",
  temp_f: "Temperature in degrees Fahrenheit",
  humidity: "% Humidity",
  pressure: "Pressure in millibar",
  last_seen_seconds: "Timestamp when this sensor was last seen",
};

const AQI_HELP: Record<AqiPollutant, string> = {
  pm2_5: "PM2.5 AQI",
  pm10_0: "PM10 AQI",
};

/** Where the collector sends what it learns each tick. */
export interface MetricsSink {
  recordReading(reading: SensorReading, metric: ReadingMetric, value: number): void;
  recordAqi(reading: SensorReading, pollutant: AqiPollutant, result: AqiResult): void;
  incrementFetchErrors(): void;
}

function sensorLabels(reading: SensorReading): Record<SensorLabel, string> {
  return {
    unit_id: reading.unitId,
    sensor_id: reading.sensorId,
    label: reading.label,
  };
}

/**
 * Prometheus-backed sink. Metrics register on the registry handed in, never on
 * prom-client's global one, so several sinks can coexist (tests do this).
 */
export class PrometheusMetricsSink implements MetricsSink {
  readonly fetchErrors: Counter;
  readonly readings: Record<ReadingMetric, Gauge<SensorLabel>>;
  readonly aqi: Record<AqiPollutant, Gauge<AqiLabel>>;

  constructor(readonly registry: Registry) {
    const registers = [registry];

    this.fetchErrors = new Counter({
      name: `${STAT_PREFIX}fetch_errors`,
      help: "Errors fetching data from PurpleAir sensor",
      registers,
    });

    const readingGauge = (metric: ReadingMetric) =>
      new Gauge({
        name: `${STAT_PREFIX}${metric}`,
        help: READING_HELP[metric],
        labelNames: SENSOR_LABELS,
        registers,
      });

    this.readings = {
      pm2_5: readingGauge("pm2_5"),
      pm10_0: readingGauge("pm10_0"),
      temp_f: readingGauge("temp_f"),
      humidity: readingGauge("humidity"),
      pressure: readingGauge("pressure"),
      last_seen_seconds: readingGauge("last_seen_seconds"),
    };

    const aqiGauge = (pollutant: AqiPollutant) =>
      new Gauge({
        name: `${STAT_PREFIX}aqi_${pollutant}`,
        help: AQI_HELP[pollutant],
        labelNames: AQI_LABELS,
        registers,
      });

    this.aqi = {
      pm2_5: aqiGauge("pm2_5"),
      pm10_0: aqiGauge("pm10_0"),
    };
  }

  recordReading(reading: SensorReading, metric: ReadingMetric, value: number) {
    this.readings[metric].set(sensorLabels(reading), value);
  }

  recordAqi(reading: SensorReading, pollutant: AqiPollutant, result: AqiResult) {
    this.aqi[pollutant].set(
      { ...sensorLabels(reading), conversion: result.conversion },
      result.value
    );
  }

  incrementFetchErrors() {
    this.fetchErrors.inc();
  }
}

export function createMetricsRegistry(): Registry {
  return new Registry();
}
