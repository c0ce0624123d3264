/**
 * Minimal HTTP health server for liveness and readiness (e.g. Kubernetes).
 * GET /health -> 200 if process is up.
 * GET /ready -> 200 only if getReady() returns true (platform started), else 503.
 * GET /metrics -> last reply metrics and memory counters.
 */

import * as http from "http";
import { logger } from "./logging";
import { getCounters, getLastReplyMetrics } from "./metrics";

export interface HealthServerOptions {
  port: number;
  /** Return true once the platform is connected and messages are being handled. */
  getReady?: () => boolean;
}

export function startHealthServer(options: HealthServerOptions): http.Server {
  const getReady = options.getReady ?? (() => false);

  const server = http.createServer((req, res) => {
    const url = req.url ?? "";
    if (req.method === "GET" && (url === "/health" || url === "/")) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: true }));
      return;
    }
    if (req.method === "GET" && url === "/ready") {
      const ready = getReady();
      const status = ready ? 200 : 503;
      res.writeHead(status, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: ready, ready }));
      return;
    }
    if (req.method === "GET" && url === "/metrics") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ lastReply: getLastReplyMetrics(), counters: getCounters() }));
      return;
    }
    res.writeHead(404);
    res.end();
  });

  server.listen(options.port, () => {
    logger.info({ event: "HEALTH_SERVER_STARTED", port: options.port }, "Health server listening");
  });

  return server;
}
