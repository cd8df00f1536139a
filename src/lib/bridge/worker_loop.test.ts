import { describe, test, expect, vi, afterEach } from "vitest";
import { WorkerLoop } from "./worker_loop.ts";
import { PendingCall, defineOperation } from "./pending_call.ts";
import { BackendInitError } from "./errors.ts";
import { InstrumentedBackend, sleep } from "../test-utils.ts";

function workCall(label: string, delayMs: number) {
  return PendingCall.of(
    defineOperation(
      "work",
      (b: InstrumentedBackend, l: string, d: number) => b.work(l, d),
      label,
      delayMs
    )
  );
}

let loops: WorkerLoop<InstrumentedBackend>[] = [];

function createLoop(
  backend: InstrumentedBackend,
  options: { pollIntervalMs?: number; onSettled?: (call: PendingCall<InstrumentedBackend, unknown>) => void } = {}
) {
  const loop = new WorkerLoop<InstrumentedBackend>({ createBackend: () => backend, ...options });
  loops.push(loop);
  return loop;
}

afterEach(async () => {
  await Promise.all(loops.map((loop) => loop.stop()));
  loops = [];
});

describe("WorkerLoop lifecycle", () => {
  test("initializes the backend lazily on start", async () => {
    const backend = new InstrumentedBackend();
    const loop = createLoop(backend);

    expect(loop.state).toBe("uninitialized");
    expect(loop.ready).toBe(false);
    expect(backend.initialized).toBe(false);

    loop.start();
    expect(await loop.whenReady(1000)).toBe(true);
    expect(loop.state).toBe("ready");
    expect(backend.initialized).toBe(true);
  });

  test("start() is idempotent", async () => {
    const createBackend = vi.fn(() => new InstrumentedBackend());
    const loop = new WorkerLoop({ createBackend });
    loop.start();
    loop.start();

    expect(await loop.whenReady(1000)).toBe(true);
    expect(createBackend).toHaveBeenCalledTimes(1);
    await loop.stop();
  });

  test("reports running while an operation executes", async () => {
    const loop = createLoop(new InstrumentedBackend());
    loop.start();
    await loop.whenReady(1000);

    const call = workCall("slow", 80);
    loop.enqueue(call);
    await sleep(20);
    expect(loop.state).toBe("running");

    await call.completion;
    expect(loop.state).toBe("ready");
  });

  test("stop() drains queued calls, then closes the backend", async () => {
    const backend = new InstrumentedBackend();
    const loop = createLoop(backend);
    loop.start();
    await loop.whenReady(1000);

    const calls = [workCall("a", 10), workCall("b", 10)];
    for (const call of calls) loop.enqueue(call);
    await loop.stop();

    expect(calls.map((c) => c.result)).toEqual(["done:a", "done:b"]);
    expect(backend.closed).toBe(true);
    expect(loop.state).toBe("stopped");
    expect(loop.ready).toBe(false);
  });

  test("stop() before start() marks the loop stopped without creating a backend", async () => {
    const createBackend = vi.fn(() => new InstrumentedBackend());
    const loop = new WorkerLoop({ createBackend });

    await loop.stop();
    await loop.stop();
    loop.start();

    expect(loop.state).toBe("stopped");
    expect(createBackend).not.toHaveBeenCalled();
    expect(await loop.whenReady(50)).toBe(false);
  });

  test("a failing backend close is logged, not thrown", async () => {
    const backend = new InstrumentedBackend({ closeError: new Error("disk gone") });
    const loop = createLoop(backend);
    loop.start();
    await loop.whenReady(1000);

    await expect(loop.stop()).resolves.toBeUndefined();
    expect(backend.closed).toBe(true);
    expect(loop.state).toBe("stopped");
  });
});

describe("WorkerLoop failure isolation", () => {
  test("a failing operation does not stop later operations", async () => {
    const backend = new InstrumentedBackend();
    const loop = createLoop(backend);
    loop.start();
    await loop.whenReady(1000);

    const failing = PendingCall.of(
      defineOperation("fail", (b: InstrumentedBackend, l: string) => b.fail(l), "x")
    );
    const next = workCall("after", 5);
    loop.enqueue(failing);
    loop.enqueue(next);
    await next.completion;

    expect(failing.error?.message).toBe("boom:x");
    expect(next.result).toBe("done:after");
    expect(backend.events).toEqual(["fail:x", "start:after", "end:after"]);
  });

  test("a throwing onSettled observer does not stop the loop", async () => {
    const onSettled = vi.fn(() => {
      throw new Error("observer exploded");
    });
    const loop = createLoop(new InstrumentedBackend(), { onSettled });
    loop.start();
    await loop.whenReady(1000);

    const first = workCall("one", 1);
    const second = workCall("two", 1);
    loop.enqueue(first);
    loop.enqueue(second);
    await second.completion;

    expect(first.result).toBe("done:one");
    expect(second.result).toBe("done:two");
    expect(onSettled).toHaveBeenCalledTimes(2);
  });

  test("keeps serving after idle wake-ups", async () => {
    const loop = createLoop(new InstrumentedBackend(), { pollIntervalMs: 10 });
    loop.start();
    await loop.whenReady(1000);
    await sleep(50);

    const call = workCall("late", 1);
    loop.enqueue(call);

    expect(await call.wait(1000)).toBe(true);
    expect(call.result).toBe("done:late");
  });

  test("initialization failure keeps ready false and rejects queued calls", async () => {
    const backend = new InstrumentedBackend({ initError: new Error("no such database") });
    const loop = createLoop(backend);
    loop.start();

    expect(await loop.whenReady(1000)).toBe(false);
    expect(loop.ready).toBe(false);
    expect(loop.state).toBe("failed");
    expect(loop.initError?.message).toBe("Backend initialization failed: no such database");

    const call = workCall("a", 1);
    loop.enqueue(call);
    await call.completion;

    expect(call.error).toBeInstanceOf(BackendInitError);
    expect(backend.events).toEqual([]);
  });
});

describe("WorkerLoop shutdown boundary", () => {
  test("calls enqueued after the sentinel are never executed", async () => {
    const backend = new InstrumentedBackend();
    const loop = createLoop(backend);
    loop.start();
    await loop.whenReady(1000);

    await loop.stop();
    const orphan = workCall("orphan", 1);
    loop.enqueue(orphan);

    expect(await orphan.wait(100)).toBe(false);
    expect(orphan.completed).toBe(false);
    expect(backend.events).toEqual([]);
  });
});
