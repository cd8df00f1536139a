export { createApp, type AppOptions } from "./app.ts";
export { createKbRoutes } from "./routes.ts";
export { HealthMonitor, type HealthMetrics, type HealthStatus } from "./health_monitor.ts";
export { startHttpServer, type HttpServerOptions, type RunningHttpServer } from "./http_server.ts";
