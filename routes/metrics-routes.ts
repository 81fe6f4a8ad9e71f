import { Hono } from "hono";
import type { Registry } from "prom-client";
import { createLogger } from "../utils/logger";

const log = createLogger("metrics-routes");

export function createMetricsRoutes(registry: Registry, startedAt = Date.now()) {
  const app = new Hono();

  // Prometheus scrape endpoint
  app.get("/metrics", async (c) => {
    try {
      const body = await registry.metrics();
      c.header("Content-Type", registry.contentType);
      return c.body(body);
    } catch (error) {
      log.error("Error rendering metrics:", error);
      return c.json({ error: "Failed to render metrics" }, 500);
    }
  });

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return app;
}
