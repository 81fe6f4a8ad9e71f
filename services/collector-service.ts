import type { AqiPollutant, SchemaVariant, SensorReading } from "../types/sensor";
import { READING_METRICS } from "../types/sensor";
import { createLogger } from "../utils/logger";
import { computeAqiResults, tableFor } from "./aqi-service";
import type { MetricsSink } from "./metrics-service";
import { maskUrl, urlFor, type SensorFetcher } from "./sensor-fetch-service";
import { parseSensorPayload } from "./sensor-parser";

const log = createLogger("collector");

const AQI_POLLUTANTS: readonly AqiPollutant[] = ["pm2_5", "pm10_0"];

export type CollectStatus = "ok" | "throttled" | "failed";

export interface TickSummary {
  ok: number;
  throttled: number;
  failed: number;
}

type Fetcher = Pick<SensorFetcher, "fetch">;

export class Collector {
  constructor(
    private readonly fetcher: Fetcher,
    private readonly sink: MetricsSink,
    private readonly variant: SchemaVariant
  ) {}

  /** Poll one unit and record what it reports. Never throws. */
  async collect(unitId: string): Promise<CollectStatus> {
    log.info(`Collecting data from sensor_id ${unitId}`);

    const url = urlFor(this.variant, unitId);
    const outcome = await this.fetcher.fetch(url);

    if (outcome.kind === "throttled") {
      log.warn(`Throttled fetching ${maskUrl(url)}`);
      return "throttled";
    }

    if (outcome.kind === "failure") {
      log.error(`Error fetching ${maskUrl(url)}: ${outcome.reason}`);
      this.sink.incrementFetchErrors();
      return "failed";
    }

    const parsed = parseSensorPayload(outcome.body, this.variant, unitId);
    if (!parsed.ok) {
      log.error(
        `Unable to parse response for sensor_id ${unitId} (${parsed.error.kind}): ${parsed.error.message}`
      );
      this.sink.incrementFetchErrors();
      return "failed";
    }

    if (parsed.readings.length === 0) {
      log.warn(`No sensors reported for sensor_id ${unitId}`);
    }

    try {
      for (const reading of parsed.readings) {
        this.record(reading);
      }
    } catch (error) {
      log.error(`Error recording metrics for sensor_id ${unitId}:`, error);
      this.sink.incrementFetchErrors();
      return "failed";
    }

    return "ok";
  }

  /** One tick: every unit, strictly in order. */
  async collectAll(unitIds: readonly string[]): Promise<TickSummary> {
    const summary: TickSummary = { ok: 0, throttled: 0, failed: 0 };
    for (const unitId of unitIds) {
      const status = await this.collect(unitId);
      summary[status]++;
    }
    log.debug(
      `Tick done: ${summary.ok} ok, ${summary.throttled} throttled, ${summary.failed} failed`
    );
    return summary;
  }

  private record(reading: SensorReading) {
    for (const metric of READING_METRICS) {
      const value = reading.values[metric];
      if (value !== undefined) {
        this.sink.recordReading(reading, metric, value);
      }
    }

    for (const pollutant of AQI_POLLUTANTS) {
      const pm = reading.values[pollutant];
      if (pm === undefined) continue;
      for (const result of computeAqiResults(pm, tableFor(pollutant))) {
        this.sink.recordAqi(reading, pollutant, result);
      }
    }
  }
}
