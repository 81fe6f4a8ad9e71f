import { Hono } from "hono";
import { logger } from "hono/logger";
import { createServer, type IncomingMessage, type Server } from "node:http";
import type { Registry } from "prom-client";
import { createMetricsRoutes } from "./routes/metrics-routes";
import { createLogger } from "./utils/logger";

const log = createLogger("server");

export function createApp(registry: Registry) {
  const app = new Hono();

  app.use(logger((message, ...rest) => log.debug(message, ...rest)));

  app.route("/", createMetricsRoutes(registry));

  app.get("/", (c) => {
    return c.json({ message: "PurpleAir exporter. Metrics are at /metrics" });
  });

  app.notFound((c) => c.json({ error: "Not Found" }, 404));

  app.onError((error, c) => {
    log.error("Unhandled route error:", error);
    return c.json(
      { error: "Internal Server Error", message: error.message },
      500
    );
  });

  return app;
}

function toRequest(req: IncomingMessage): Request {
  const url = new URL(req.url || "/", `http://${req.headers.host || "localhost"}`);

  const headers = new Headers();
  Object.entries(req.headers).forEach(([key, value]) => {
    if (value) headers.set(key, Array.isArray(value) ? value.join(", ") : value);
  });

  // Only GET and HEAD are routed, so request bodies are never forwarded.
  return new Request(url.toString(), { method: req.method || "GET", headers });
}

export interface FetchHandler {
  fetch(request: Request): Response | Promise<Response>;
}

/**
 * Serve a Hono app over Node's http module. Resolves once listening; a
 * listen error such as EADDRINUSE rejects.
 */
export function startServer(app: FetchHandler, port: number): Promise<Server> {
  const server = createServer(async (req, res) => {
    try {
      const response = await app.fetch(toRequest(req));

      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        if (key.toLowerCase() !== "transfer-encoding") {
          res.setHeader(key, value);
        }
      });

      res.end(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      log.error("Server error:", error);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
      }
      if (!res.writableEnded) {
        res.end(
          JSON.stringify({
            error: "Internal Server Error",
            message: error instanceof Error ? error.message : String(error),
          })
        );
      }
    }
  });

  return new Promise((resolve, reject) => {
    const onListenError = (error: Error) => reject(error);
    server.once("error", onListenError);
    server.listen(port, () => {
      server.off("error", onListenError);
      server.on("error", (error) => log.error("Server error:", error));
      log.info(`Serving metrics on http://localhost:${listeningPort(server)}/metrics`);
      resolve(server);
    });
  });
}

export function listeningPort(server: Server): number | null {
  const address = server.address();
  return address !== null && typeof address === "object" ? address.port : null;
}
