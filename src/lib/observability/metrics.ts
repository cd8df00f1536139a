/**
 * Prometheus Metrics for kbridge
 *
 * Exposes metrics for:
 * - Bridge call counts by operation and outcome
 * - Bridge call durations (submit to outcome)
 * - Dispatch queue depth
 * - Results that arrived after their caller timed out
 */

import * as client from "prom-client";

// Collect default Node.js metrics (CPU, memory, event loop)
client.collectDefaultMetrics({ prefix: "kbridge_" });

export const registry = client.register;

export const bridgeCallsTotal = new client.Counter({
  name: "kbridge_bridge_calls_total",
  help: "Total number of calls submitted to the bridge, by outcome",
  labelNames: ["operation", "status"] as const,
});

export const bridgeCallDuration = new client.Histogram({
  name: "kbridge_bridge_call_duration_seconds",
  help: "Time from submission to outcome for bridge calls",
  labelNames: ["operation"] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 15, 30, 120],
});

export const bridgeQueueDepth = new client.Gauge({
  name: "kbridge_bridge_queue_depth",
  help: "Number of calls waiting in the dispatch queue",
});

export const bridgeLateResults = new client.Counter({
  name: "kbridge_bridge_late_results_total",
  help: "Calls that completed after their caller stopped waiting",
  labelNames: ["operation"] as const,
});

export type CallStatus = "ok" | "error" | "timeout" | "not_ready";

/**
 * Start a timer for a bridge call; the returned function records the outcome
 */
export function startCallTimer(operation: string): (status: CallStatus) => void {
  const end = bridgeCallDuration.startTimer({ operation });
  return (status: CallStatus) => {
    end();
    bridgeCallsTotal.inc({ operation, status });
  };
}

export function recordLateResult(operation: string): void {
  bridgeLateResults.inc({ operation });
}

export function setQueueDepth(depth: number): void {
  bridgeQueueDepth.set(depth);
}

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getMetricsContentType(): string {
  return registry.contentType;
}
