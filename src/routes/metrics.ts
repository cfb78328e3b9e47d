import { Hono } from "hono";
import { metrics } from "../monitoring/metrics";
import type { LedgerDatabase } from "../db/repositories";
import { logger } from "../utils/logger";

export function metricsRoutes(db: LedgerDatabase) {
  const routes = new Hono();

  // Prometheus-compatible metrics endpoint
  routes.get("/", (c) => {
    return c.text(metrics.exportPrometheus(), 200, {
      "Content-Type": "text/plain; version=0.0.4",
    });
  });

  routes.get("/json", (c) => c.json(metrics.exportJSON()));

  routes.get("/summary", (c) => c.json(metrics.getSummary()));

  routes.get("/health", (c) => {
    const summary = metrics.getSummary();

    const isHealthy =
      summary.errorRate < 10 && // Less than 10% errors
      summary.avgRequestDuration < 1000; // Avg response < 1s

    return c.json(
      {
        status: isHealthy ? "healthy" : "degraded",
        timestamp: new Date().toISOString(),
        metrics: summary,
      },
      isHealthy ? 200 : 503,
    );
  });

  // Readiness: the ledger is useless without its database.
  routes.get("/ready", async (c) => {
    try {
      await db.ping();
    } catch (err) {
      logger.warn({ err }, "Readiness check failed");
      return c.json(
        { status: "unavailable", timestamp: new Date().toISOString() },
        503,
      );
    }
    return c.json({ status: "ready", timestamp: new Date().toISOString() });
  });

  routes.get("/live", (c) => {
    return c.json({ status: "alive", timestamp: new Date().toISOString() });
  });

  return routes;
}
