/**
 * Test Utilities for kbridge
 *
 * Instrumented backends and fetch fakes shared by the test suites.
 */

import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ManagedBackend } from "./bridge/index.ts";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Block the current thread for `ms`, the way a synchronous database call does
 */
export function blockFor(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Backend that records every call and how many run at once.
 * `maxActive` above 1 means two operations overlapped.
 */
export class InstrumentedBackend implements ManagedBackend {
  active = 0;
  maxActive = 0;
  events: string[] = [];
  initialized = false;
  closed = false;

  constructor(private readonly options: { initError?: Error; closeError?: Error } = {}) {}

  initialize(): void {
    if (this.options.initError) {
      throw this.options.initError;
    }
    this.initialized = true;
  }

  close(): void {
    this.closed = true;
    if (this.options.closeError) {
      throw this.options.closeError;
    }
  }

  async work(label: string, delayMs: number): Promise<string> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    this.events.push(`start:${label}`);
    try {
      await sleep(delayMs);
      return `done:${label}`;
    } finally {
      this.events.push(`end:${label}`);
      this.active--;
    }
  }

  fail(label: string): never {
    this.events.push(`fail:${label}`);
    throw new Error(`boom:${label}`);
  }
}

export interface RecordedRequest {
  url: string;
  method: string;
  body?: unknown;
}

/**
 * Fake fetch answering every request with the same JSON payload
 */
export function createFetchStub(
  payload: unknown,
  status = 200
): { fetch: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const stub: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const body = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    requests.push({ url, method: init?.method ?? "GET", body });
    return new Response(JSON.stringify(payload), {
      status,
      headers: { "content-type": "application/json" },
    });
  };
  return { fetch: stub, requests };
}

/**
 * Fake fetch that always fails like an unreachable server
 */
export function createFailingFetch(message = "connect ECONNREFUSED 127.0.0.1:18790"): typeof fetch {
  return async () => {
    throw new TypeError(message);
  };
}

/**
 * Create a unique temporary directory for file-based tests
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), "kbridge-test-"));
}
