import { OpenAPIHono } from "@hono/zod-openapi";
import type { KnowledgeService } from "../knowledge/knowledge_service.ts";
import {
  createComponentLogger,
  extractTraceId,
  getMetrics,
  getMetricsContentType,
  withTraceAsync,
} from "../observability/index.ts";
import type { HealthMonitor } from "./health_monitor.ts";
import { createKbRoutes } from "./routes.ts";

const log = createComponentLogger("http");

export interface AppOptions {
  /** Source of /health lag and memory figures; the caller starts and stops it */
  healthMonitor: HealthMonitor;
}

/**
 * HTTP app: knowledge base routes under /api/kb plus /health, /metrics and /doc
 */
export function createApp(service: KnowledgeService, options: AppOptions): OpenAPIHono {
  const app = new OpenAPIHono();
  const health = options.healthMonitor;

  // Every request runs in its own trace context; the id is echoed back
  app.use("*", async (c, next) => {
    const traceId = extractTraceId(c.req.header("x-trace-id"));
    c.header("x-trace-id", traceId);
    await withTraceAsync(traceId, () => next(), `${c.req.method} ${c.req.path}`);
  });

  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, "Unhandled route error");
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/health", (c) => {
    const status = health.getStatus();
    return c.json({
      status: status.healthy ? "ok" : "degraded",
      kb_ready: service.ready,
      worker: service.workerState,
      queue_depth: service.queueDepth,
      event_loop_lag_ms: Math.round(status.metrics.eventLoopLag),
      warnings: status.warnings,
    });
  });

  app.get("/metrics", async (c) => {
    c.header("Content-Type", getMetricsContentType());
    return c.body(await getMetrics());
  });

  app.route("/api/kb", createKbRoutes(service));

  app.doc("/doc", {
    openapi: "3.0.0",
    info: { title: "kbridge", version: "0.1.0" },
  });

  return app;
}
