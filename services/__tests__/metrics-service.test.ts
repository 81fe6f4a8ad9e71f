import { describe, test, expect } from "vitest";
import type { SensorReading } from "../../types/sensor";
import { createMetricsRegistry, PrometheusMetricsSink } from "../metrics-service";

const reading: SensorReading = {
  unitId: "1234",
  sensorId: "1235",
  label: "Backyard",
  values: { pm2_5: 12.5 },
};

describe("PrometheusMetricsSink", () => {
  test("registers every metric under its contract name", async () => {
    const registry = createMetricsRegistry();
    new PrometheusMetricsSink(registry);

    const names = (await registry.getMetricsAsJSON()).map((m) => m.name).sort();

    expect(names).toEqual([
      "purpleair_aqi_pm10_0",
      "purpleair_aqi_pm2_5",
      "purpleair_fetch_errors",
      "purpleair_humidity",
      "purpleair_last_seen_seconds",
      "purpleair_pm10_0",
      "purpleair_pm2_5",
      "purpleair_pressure",
      "purpleair_temp_f",
    ]);
  });

  test("gauges carry unit, sensor and label", async () => {
    const sink = new PrometheusMetricsSink(createMetricsRegistry());

    sink.recordReading(reading, "pm2_5", 12.5);

    const { values } = await sink.readings.pm2_5.get();
    expect(values.map(({ value, labels }) => ({ value, labels }))).toEqual([
      { value: 12.5, labels: { unit_id: "1234", sensor_id: "1235", label: "Backyard" } },
    ]);
  });

  test("AQI gauges add the conversion label", async () => {
    const sink = new PrometheusMetricsSink(createMetricsRegistry());

    sink.recordAqi(reading, "pm2_5", { value: 52.1, conversion: "" });
    sink.recordAqi(reading, "pm2_5", { value: 48.3, conversion: "AQandU" });

    const { values } = await sink.aqi.pm2_5.get();
    expect(values.map(({ value, labels }) => ({ value, labels }))).toEqual([
      {
        value: 52.1,
        labels: { unit_id: "1234", sensor_id: "1235", label: "Backyard", conversion: "" },
      },
      {
        value: 48.3,
        labels: { unit_id: "1234", sensor_id: "1235", label: "Backyard", conversion: "AQandU" },
      },
    ]);
  });

  test("a later reading overwrites the gauge", async () => {
    const sink = new PrometheusMetricsSink(createMetricsRegistry());

    sink.recordReading(reading, "humidity", 40);
    sink.recordReading(reading, "humidity", 42);

    const { values } = await sink.readings.humidity.get();
    expect(values.map((v) => v.value)).toEqual([42]);
  });

  test("fetch errors only go up", async () => {
    const sink = new PrometheusMetricsSink(createMetricsRegistry());

    sink.incrementFetchErrors();
    sink.incrementFetchErrors();

    const { values } = await sink.fetchErrors.get();
    expect(values.map((v) => v.value)).toEqual([2]);
  });

  test("separate registries do not share state", async () => {
    const first = new PrometheusMetricsSink(createMetricsRegistry());
    const second = new PrometheusMetricsSink(createMetricsRegistry());

    first.incrementFetchErrors();

    const { values } = await second.fetchErrors.get();
    expect(values.map((v) => v.value)).toEqual([0]);
  });
});
