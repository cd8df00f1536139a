/**
 * HealthMonitor
 *
 * Samples event-loop lag and memory usage. Synchronous backend calls run
 * on the event loop, so lag is the first sign of a backend call that is
 * stalling the server.
 *
 * Logs a warning when a threshold is exceeded.
 */

import { createComponentLogger } from "../observability/index.ts";

const log = createComponentLogger("health");

export interface HealthMetrics {
  timestamp: number;
  memoryUsage: NodeJS.MemoryUsage;
  eventLoopLag: number;
}

export interface HealthStatus {
  healthy: boolean;
  warnings: string[];
  metrics: HealthMetrics;
}

// Thresholds
const MEMORY_THRESHOLD_MB = 500;
const EVENT_LOOP_LAG_MS = 100;
const LAG_SAMPLE_INTERVAL_MS = 1000;

export class HealthMonitor {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private enabled = false;
  private lagCheckStart = 0;
  private lastEventLoopLag = 0;

  start(): void {
    if (this.enabled) return;
    this.enabled = true;
    this.scheduleEventLoopCheck();
    log.debug("Health monitoring started");
  }

  stop(): void {
    if (!this.enabled) return;
    this.enabled = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    log.debug("Health monitoring stopped");
  }

  /**
   * Time from scheduling to running a setImmediate callback
   */
  private scheduleEventLoopCheck(): void {
    if (!this.enabled) return;

    this.lagCheckStart = performance.now();
    setImmediate(() => {
      this.lastEventLoopLag = performance.now() - this.lagCheckStart;
      if (this.lastEventLoopLag > EVENT_LOOP_LAG_MS) {
        log.warn({ eventLoopLagMs: Math.round(this.lastEventLoopLag) }, "Event loop lag");
      }
      if (!this.enabled) return;
      this.timer = setTimeout(() => this.scheduleEventLoopCheck(), LAG_SAMPLE_INTERVAL_MS);
      this.timer.unref();
    });
  }

  getStatus(): HealthStatus {
    const memoryUsage = process.memoryUsage();
    const warnings: string[] = [];

    const rssMB = memoryUsage.rss / 1024 / 1024;
    if (rssMB > MEMORY_THRESHOLD_MB) {
      warnings.push(`High memory usage: ${rssMB.toFixed(1)}MB RSS`);
    }
    if (this.lastEventLoopLag > EVENT_LOOP_LAG_MS) {
      warnings.push(`Event loop lag: ${this.lastEventLoopLag.toFixed(1)}ms`);
    }

    return {
      healthy: warnings.length === 0,
      warnings,
      metrics: {
        timestamp: Date.now(),
        memoryUsage,
        eventLoopLag: this.lastEventLoopLag,
      },
    };
  }
}
