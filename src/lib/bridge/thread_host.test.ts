/**
 * Tests for ThreadHost and serveInThread
 *
 * The thread under test blocks synchronously, like better-sqlite3 does, so
 * these also check that callers on the main thread keep running meanwhile.
 */

import { describe, test, expect, afterEach } from "vitest";
import { ThreadHost, type ThreadHostOptions } from "./thread_host.ts";
import { SerialBridge } from "./serial_bridge.ts";
import { defineOperation } from "./pending_call.ts";
import type { ManagedBackend } from "./worker_loop.ts";

const BLOCKING_WORKER = new URL("../test-workers/blocking_worker.ts", import.meta.url);

// Spawning a thread loads the TypeScript loader from scratch
const THREAD_TEST_TIMEOUT_MS = 20000;

let hosts: ThreadHost[] = [];

function spawnHost(options: Partial<ThreadHostOptions> = {}): ThreadHost {
  const host = new ThreadHost({ entry: BLOCKING_WORKER, ...options });
  hosts.push(host);
  host.spawn();
  return host;
}

/** Counts 10ms interval ticks until stopped */
function tickCounter(): { stop: () => number } {
  let ticks = 0;
  const timer = setInterval(() => ticks++, 10);
  return {
    stop() {
      clearInterval(timer);
      return ticks;
    },
  };
}

afterEach(async () => {
  await Promise.all(hosts.map((h) => h.terminate()));
  hosts = [];
});

describe("ThreadHost", () => {
  test("round-trips arguments and results", async () => {
    const host = spawnHost();

    expect(await host.call("echo", ["a", 1, { b: [true] }])).toEqual(["a", 1, { b: [true] }]);
    expect(host.pendingCount).toBe(0);
  }, THREAD_TEST_TIMEOUT_MS);

  test("rebuilds thrown errors from their name and message", async () => {
    const host = spawnHost();

    const error = await host.call("fail", ["x"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    if (error instanceof Error) {
      expect(error.name).toBe("RefusedError");
      expect(error.message).toBe("refused: x");
    }
  }, THREAD_TEST_TIMEOUT_MS);

  test("hands the error code to a custom reviver", async () => {
    const host = spawnHost({ reviveError: (error) => new Error(`${error.code}: ${error.message}`) });

    await expect(host.call("fail", ["y"])).rejects.toThrow("E_REFUSED: refused: y");
  }, THREAD_TEST_TIMEOUT_MS);

  test("a blocked thread leaves the calling event loop free", async () => {
    const host = spawnHost();
    await host.call("echo", []);

    const ticks = tickCounter();
    const started = Date.now();
    const result = await host.call("block", [300]);
    const elapsed = Date.now() - started;

    expect(result).toBe("blocked 300ms");
    expect(elapsed).toBeGreaterThanOrEqual(290);
    expect(ticks.stop()).toBeGreaterThan(5);
  }, THREAD_TEST_TIMEOUT_MS);

  test("answers in the order calls were sent", async () => {
    const host = spawnHost();
    const order: string[] = [];

    await Promise.all([
      host.call("block", [100]).then(() => order.push("block")),
      host.call("echo", ["after"]).then(() => order.push("echo")),
    ]);

    expect(order).toEqual(["block", "echo"]);
  }, THREAD_TEST_TIMEOUT_MS);

  test("a thread that exits rejects in-flight and later calls", async () => {
    const host = spawnHost();

    await expect(host.call("exit", [])).rejects.toThrow("backend thread exited with code 3");
    expect(host.running).toBe(false);
    await expect(host.call("echo", [])).rejects.toThrow("backend thread exited with code 3");
  }, THREAD_TEST_TIMEOUT_MS);

  test("rejects calls before the thread is spawned", async () => {
    const host = new ThreadHost({ entry: BLOCKING_WORKER });

    await expect(host.call("echo", [])).rejects.toThrow("backend thread not started (method: echo)");
  });
});

class BlockingBackend implements ManagedBackend {
  readonly host = new ThreadHost({ entry: BLOCKING_WORKER });

  async initialize(): Promise<void> {
    this.host.spawn();
    await this.host.call("echo", []);
  }

  async close(): Promise<void> {
    await this.host.terminate();
  }

  block(ms: number): Promise<unknown> {
    return this.host.call("block", [ms]);
  }

  echo(value: string): Promise<unknown> {
    return this.host.call("echo", [value]);
  }
}

const block = (ms: number) =>
  defineOperation("block", (b: BlockingBackend, m: number) => b.block(m), ms);

const echo = (value: string) =>
  defineOperation("echo", (b: BlockingBackend, v: string) => b.echo(v), value);

describe("SerialBridge over a blocking thread", () => {
  test("a call that outlasts its timeout degrades on time, and the next call still runs", async () => {
    const bridge = new SerialBridge<BlockingBackend>({ createBackend: () => new BlockingBackend() });
    bridge.start();
    try {
      expect(await bridge.whenReady(15000)).toBe(true);

      const ticks = tickCounter();
      const started = Date.now();
      const slow = await bridge.submit(block(600), 100);
      const elapsed = Date.now() - started;

      expect(slow.status).toBe("timeout");
      expect(elapsed).toBeLessThan(400);
      expect(ticks.stop()).toBeGreaterThan(0);

      expect(await bridge.submit(echo("next"), 5000)).toEqual({ status: "ok", value: ["next"] });
    } finally {
      await bridge.close();
    }
  }, THREAD_TEST_TIMEOUT_MS);
});
