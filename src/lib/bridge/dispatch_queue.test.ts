import { describe, test, expect } from "vitest";
import { DispatchQueue, EMPTY } from "./dispatch_queue.ts";
import { IllegalStateError } from "./errors.ts";

describe("DispatchQueue", () => {
  test("returns buffered items in FIFO order", async () => {
    const queue = new DispatchQueue<string>();
    queue.enqueue("a");
    queue.enqueue("b");
    queue.enqueue("c");

    expect(queue.size).toBe(3);
    expect(await queue.dequeue(10)).toBe("a");
    expect(await queue.dequeue(10)).toBe("b");
    expect(await queue.dequeue(10)).toBe("c");
    expect(queue.size).toBe(0);
  });

  test("resolves EMPTY when nothing arrives before the timeout", async () => {
    const queue = new DispatchQueue<string>();
    const started = Date.now();

    const item = await queue.dequeue(30);

    expect(item).toBe(EMPTY);
    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
    expect(queue.hasWaitingConsumer).toBe(false);
  });

  test("wakes a parked consumer as soon as an item is enqueued", async () => {
    const queue = new DispatchQueue<number>();
    const started = Date.now();
    const pending = queue.dequeue(5000);

    expect(queue.hasWaitingConsumer).toBe(true);
    queue.enqueue(42);

    expect(await pending).toBe(42);
    expect(Date.now() - started).toBeLessThan(1000);
    expect(queue.size).toBe(0);
  });

  test("rejects a second concurrent consumer", async () => {
    const queue = new DispatchQueue<number>();
    const first = queue.dequeue(50);

    expect(() => queue.dequeue(50)).toThrow(IllegalStateError);

    queue.enqueue(1);
    expect(await first).toBe(1);
  });

  test("enqueue never blocks with many producers", () => {
    const queue = new DispatchQueue<number>();
    for (let i = 0; i < 10000; i++) {
      queue.enqueue(i);
    }
    expect(queue.size).toBe(10000);
  });
});
