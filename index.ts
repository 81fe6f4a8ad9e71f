#!/usr/bin/env node
import {
  ConfigError,
  loadConfig,
  loadEnvFile,
  type AppConfig,
} from "./config/app-config";
import { createApp, startServer } from "./server";
import { Collector } from "./services/collector-service";
import {
  createMetricsRegistry,
  PrometheusMetricsSink,
} from "./services/metrics-service";
import { SensorFetcher } from "./services/sensor-fetch-service";
import { Ticker } from "./services/ticker";
import { createLogger, setLogLevel } from "./utils/logger";

const log = createLogger("purple-air-exporter");

// Bad configuration is fatal before anything is scheduled.
function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const problem of error.problems) {
        log.error(`Missing or invalid setting: ${problem}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

export async function main(): Promise<void> {
  const envPath = loadEnvFile();
  const config = loadConfigOrExit();

  setLogLevel(config.logLevel);
  log.info(
    envPath
      ? `Environment variables loaded from: ${envPath}`
      : "No .env file found, using environment variables from process."
  );
  log.info("Configuration loaded:", {
    variant: config.variant.kind,
    host: config.variant.host,
    sensorIds: config.sensorIds,
    intervalSeconds: config.intervalMs / 1000,
    promPort: config.promPort,
  });

  const registry = createMetricsRegistry();
  const sink = new PrometheusMetricsSink(registry);
  const fetcher = new SensorFetcher({ timeoutMs: config.requestTimeoutMs });
  const collector = new Collector(fetcher, sink, config.variant);
  const ticker = new Ticker(config.intervalMs);

  const server = await startServer(createApp(registry), config.promPort);

  const shutdown = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, stopping`);
    ticker.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await ticker.run(async () => {
    await collector.collectAll(config.sensorIds);
  });

  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  log.info("Stopped");
}

// Only start polling if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    log.error("Fatal error:", error);
    process.exit(1);
  });
}
