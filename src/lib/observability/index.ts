/**
 * Observability Module - Centralized exports
 *
 * Provides:
 * - Structured logging with correlation IDs
 * - Prometheus metrics for the bridge
 */

export {
  logger,
  createComponentLogger,
  generateTraceId,
  extractTraceId,
  withTraceAsync,
  getTraceContext,
  requestContext,
  type RequestContext,
  type Logger,
} from "./logger.ts";

export {
  registry,
  getMetrics,
  getMetricsContentType,
  bridgeCallsTotal,
  bridgeCallDuration,
  bridgeQueueDepth,
  bridgeLateResults,
  startCallTimer,
  recordLateResult,
  setQueueDepth,
  type CallStatus,
} from "./metrics.ts";
