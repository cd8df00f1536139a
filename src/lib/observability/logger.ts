/**
 * Structured Logging with Correlation IDs
 *
 * Uses pino for JSON logging with AsyncLocalStorage for trace ID
 * propagation across async boundaries. Calls handed to the bridge
 * worker carry the trace ID of the request that submitted them, so
 * worker log lines can be matched to the HTTP request that caused them.
 */

import { pino } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

export interface RequestContext {
  traceId: string;
  operation?: string;
  startTime?: number;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport:
    process.env.MODE === "development"
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  base: {
    pid: process.pid,
    env: process.env.NODE_ENV || "development",
  },
  // Inject traceId from context into every log line
  mixin() {
    const ctx = requestContext.getStore();
    if (ctx) {
      return {
        traceId: ctx.traceId,
        ...(ctx.operation && { operation: ctx.operation }),
      };
    }
    return {};
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Generate a new trace ID
 */
export function generateTraceId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Trace ID from an incoming header, or a fresh one when absent or malformed
 */
export function extractTraceId(header: string | undefined): string {
  return header && /^[\w-]{1,64}$/.test(header) ? header : generateTraceId();
}

/**
 * Run an async function within a traced context.
 * All logs within the function will include the traceId.
 */
export async function withTraceAsync<T>(
  traceId: string,
  fn: () => Promise<T>,
  operation?: string
): Promise<T> {
  return requestContext.run({ traceId, operation, startTime: Date.now() }, fn);
}

export function getTraceContext(): RequestContext | undefined {
  return requestContext.getStore();
}

/**
 * Create a child logger for a specific component
 */
export function createComponentLogger(component: string) {
  return logger.child({ component });
}

export type Logger = typeof logger;
