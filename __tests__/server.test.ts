import type { Server } from "node:http";
import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { createApp, listeningPort, startServer } from "../server";
import { createMetricsRegistry, PrometheusMetricsSink } from "../services/metrics-service";

const servers: Server[] = [];

async function serve(app: Parameters<typeof startServer>[0]): Promise<string> {
  const server = await startServer(app, 0);
  servers.push(server);
  return `http://127.0.0.1:${listeningPort(server)}`;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  for (const server of servers.splice(0)) {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
  vi.restoreAllMocks();
});

describe("startServer", () => {
  test("GET /metrics is served through the Node http bridge", async () => {
    const registry = createMetricsRegistry();
    new PrometheusMetricsSink(registry).incrementFetchErrors();
    const base = await serve(createApp(registry));

    const res = await fetch(`${base}/metrics`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe(registry.contentType);
    expect((await res.text()).split("\n")).toContain("purpleair_fetch_errors 1");
  });

  test("HEAD /metrics answers with headers and no body", async () => {
    const registry = createMetricsRegistry();
    new PrometheusMetricsSink(registry);
    const base = await serve(createApp(registry));

    const res = await fetch(`${base}/metrics`, { method: "HEAD" });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe(registry.contentType);
    expect(await res.text()).toBe("");
  });

  test("a failing metrics render is a 500 JSON body", async () => {
    const registry = createMetricsRegistry();
    vi.spyOn(registry, "metrics").mockRejectedValue(new Error("collect failed"));
    const base = await serve(createApp(registry));

    const res = await fetch(`${base}/metrics`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Failed to render metrics" });
  });

  test("a handler that throws is answered with 500 JSON", async () => {
    const base = await serve({
      fetch: () => {
        throw new Error("boom");
      },
    });

    const res = await fetch(`${base}/metrics`);

    expect(res.status).toBe(500);
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(await res.json()).toEqual({ error: "Internal Server Error", message: "boom" });
  });

  test("a port already in use rejects instead of crashing", async () => {
    const app = createApp(createMetricsRegistry());
    const first = await startServer(app, 0);
    servers.push(first);

    await expect(startServer(app, listeningPort(first) ?? 0)).rejects.toMatchObject({
      code: "EADDRINUSE",
    });
  });
});
