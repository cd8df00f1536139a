/**
 * WorkerLoop
 *
 * The single consumer of the dispatch queue and the only owner of the
 * backend handle. Operations run strictly one after another; a failing
 * operation is captured into its PendingCall and the loop moves on. Only
 * the shutdown sentinel ends the loop.
 *
 * States:
 *   uninitialized -> ready <-> running -> stopped
 *   uninitialized -> failed -> stopped      (initialize() threw)
 */

import { createComponentLogger, withTraceAsync } from "../observability/index.ts";
import { DispatchQueue, EMPTY } from "./dispatch_queue.ts";
import { BackendInitError, NotReadyError, extractErrorMessage, toError } from "./errors.ts";
import type { Awaitable, PendingCall } from "./pending_call.ts";

const log = createComponentLogger("worker-loop");

export type WorkerState = "uninitialized" | "ready" | "running" | "failed" | "stopped";

/** Lifecycle every backend driven by the loop must expose */
export interface ManagedBackend {
  initialize(): Awaitable<void>;
  close(): Awaitable<void>;
}

export interface WorkerLoopOptions<B> {
  /** Builds the backend; called once, on the loop's first iteration */
  createBackend: () => B;
  /** How long an idle dequeue waits before the loop wakes up (default 60s) */
  pollIntervalMs?: number;
  /** Called after every call the loop settles */
  onSettled?: (call: PendingCall<B, unknown>) => void;
}

/** Poison pill: the loop exits when it dequeues this */
export const SENTINEL: unique symbol = Symbol("worker-loop.sentinel");

type QueueItem<B> = PendingCall<B, unknown> | typeof SENTINEL;

const DEFAULT_POLL_INTERVAL_MS = 60000;

export class WorkerLoop<B extends ManagedBackend> {
  private readonly queue = new DispatchQueue<QueueItem<B>>();
  private readonly createBackend: () => B;
  private readonly pollIntervalMs: number;
  private readonly onSettled?: (call: PendingCall<B, unknown>) => void;

  private currentState: WorkerState = "uninitialized";
  private loop: Promise<void> | null = null;
  private stopRequested = false;
  private initFailure: BackendInitError | null = null;
  private readyWaiters = new Set<(ready: boolean) => void>();

  constructor(options: WorkerLoopOptions<B>) {
    this.createBackend = options.createBackend;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.onSettled = options.onSettled;
  }

  /**
   * Start the loop. Idempotent; a stopped loop is never restarted.
   */
  start(): void {
    if (this.stopRequested) {
      log.warn("start() called after stop(); worker stays stopped");
      return;
    }
    if (this.loop) return;
    this.loop = this.run();
  }

  enqueue(call: PendingCall<B, unknown>): void {
    if (this.stopRequested) {
      log.warn({ operation: call.name }, "Call enqueued after shutdown was requested; it will not run");
    }
    this.queue.enqueue(call);
  }

  /**
   * Request shutdown. Calls queued before this point still run (the sentinel
   * is FIFO like any other item); the backend is closed by the loop itself.
   * Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    if (!this.stopRequested) {
      this.stopRequested = true;
      if (this.loop) {
        this.queue.enqueue(SENTINEL);
      } else {
        this.currentState = "stopped";
        this.notifyReady(false);
      }
    }
    await this.loop;
  }

  /**
   * Resolves true once the backend is initialized, false if initialization
   * failed, the loop was stopped, or `timeoutMs` elapsed first.
   */
  whenReady(timeoutMs: number): Promise<boolean> {
    if (this.ready) return Promise.resolve(true);
    if (this.stopRequested || this.currentState === "failed" || this.currentState === "stopped") {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const waiter = (ready: boolean) => {
        clearTimeout(timer);
        this.readyWaiters.delete(waiter);
        resolve(ready);
      };
      const timer = setTimeout(() => waiter(false), timeoutMs);
      this.readyWaiters.add(waiter);
    });
  }

  get ready(): boolean {
    return !this.stopRequested && (this.currentState === "ready" || this.currentState === "running");
  }

  get state(): WorkerState {
    return this.currentState;
  }

  get queueDepth(): number {
    return this.queue.size;
  }

  get initError(): BackendInitError | null {
    return this.initFailure;
  }

  private async run(): Promise<void> {
    const backend = await this.initialize();

    for (;;) {
      try {
        const item = await this.queue.dequeue(this.pollIntervalMs);
        if (item === EMPTY) {
          log.debug({ state: this.currentState }, "Worker idle");
          continue;
        }
        if (item === SENTINEL) break;
        await this.process(backend, item);
      } catch (error) {
        // Bookkeeping fault outside any operation: log, yield, keep serving
        log.error({ err: toError(error) }, "Worker loop error");
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }

    if (backend) {
      await this.closeBackend(backend);
    }
    this.currentState = "stopped";
    this.notifyReady(false);
    log.info("Worker loop stopped");
  }

  private async initialize(): Promise<B | null> {
    let backend: B | null = null;
    try {
      backend = this.createBackend();
      await backend.initialize();
      this.currentState = "ready";
      log.info("Backend initialized");
      this.notifyReady(true);
      return backend;
    } catch (error) {
      this.initFailure = new BackendInitError(error);
      this.currentState = "failed";
      log.error({ err: toError(error) }, "Backend initialization failed; queued calls will be rejected");
      if (backend) {
        await this.closeBackend(backend);
      }
      this.notifyReady(false);
      return null;
    }
  }

  private async process(backend: B | null, call: PendingCall<B, unknown>): Promise<void> {
    if (!backend) {
      call.reject(this.initFailure ?? new NotReadyError(call.name));
    } else {
      this.currentState = "running";
      try {
        const run = () => call.execute(backend);
        const value = call.traceId
          ? await withTraceAsync(call.traceId, run, call.name)
          : await run();
        call.resolve(value);
      } catch (error) {
        log.error(
          { operation: call.name, traceId: call.traceId, error: extractErrorMessage(error) },
          "Operation failed"
        );
        call.reject(toError(error));
      } finally {
        this.currentState = "ready";
      }

      if (call.abandoned) {
        log.warn(
          { operation: call.name, traceId: call.traceId, elapsedMs: Date.now() - call.submittedAt },
          "Operation finished after its caller timed out; result discarded"
        );
      }
    }

    this.onSettled?.(call);
  }

  private async closeBackend(backend: B): Promise<void> {
    try {
      await backend.close();
    } catch (error) {
      log.error({ err: toError(error) }, "Backend close failed");
    }
  }

  private notifyReady(ready: boolean): void {
    for (const waiter of [...this.readyWaiters]) {
      waiter(ready);
    }
  }
}
