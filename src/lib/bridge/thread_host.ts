/**
 * ThreadHost
 *
 * Main-thread handle on a backend living in a worker thread. Each call is
 * posted as `{ id, method, args }` and settled from the matching reply, so a
 * backend that blocks (better-sqlite3, large file parsing) stalls only its
 * own thread while callers' timers and the HTTP server keep running.
 *
 * The thread entry is a TypeScript module that calls `serveInThread`; it is
 * loaded through thread_bootstrap.mjs, which registers tsx in the new thread.
 */

import { Worker } from "node:worker_threads";
import { createComponentLogger, getTraceContext } from "../observability/index.ts";
import { toError } from "./errors.ts";
import { ThreadReplySchema, type RemoteError, type ThreadRequest } from "./thread_protocol.ts";

const log = createComponentLogger("thread-host");

const BOOTSTRAP = new URL("./thread_bootstrap.mjs", import.meta.url);

export interface ThreadHostOptions {
  /** Module run inside the thread */
  entry: URL;
  /** Handed to the entry through `threadData()`; must survive structured clone */
  data?: unknown;
  /** Rebuilds a local error from a serialized one */
  reviveError?: (error: RemoteError) => Error;
}

interface Waiter {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

function defaultRevive(error: RemoteError): Error {
  const revived = new Error(error.message);
  revived.name = error.name;
  return revived;
}

export class ThreadHost {
  private worker: Worker | null = null;
  private exited: Promise<void> = Promise.resolve();
  private stoppedReason: Error | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, Waiter>();
  private readonly revive: (error: RemoteError) => Error;

  constructor(private readonly options: ThreadHostOptions) {
    this.revive = options.reviveError ?? defaultRevive;
  }

  /**
   * Start the thread. Idempotent; a thread that has exited is not respawned.
   */
  spawn(): void {
    if (this.worker || this.stoppedReason) return;

    const worker = new Worker(BOOTSTRAP, {
      workerData: { entry: this.options.entry.href, data: this.options.data },
      // The bootstrap registers its own loader; inherited loader flags would stack
      execArgv: [],
    });

    worker.on("message", (message: unknown) => this.handleReply(message));
    worker.on("error", (error) => {
      log.error({ err: error }, "Backend thread crashed");
      this.failPending(error);
    });
    this.exited = new Promise<void>((resolve) => {
      worker.once("exit", (code) => {
        const reason = this.stoppedReason ?? new Error(`backend thread exited with code ${code}`);
        this.worker = null;
        this.stoppedReason = reason;
        this.failPending(reason);
        log.info({ code }, "Backend thread exited");
        resolve();
      });
    });

    this.worker = worker;
    log.debug({ entry: this.options.entry.href }, "Backend thread spawned");
  }

  /**
   * Run `method` in the thread. Requests are answered in the order they are sent.
   */
  call(method: string, args: readonly unknown[]): Promise<unknown> {
    const worker = this.worker;
    if (!worker) {
      return Promise.reject(this.stoppedReason ?? new Error(`backend thread not started (method: ${method})`));
    }

    const id = this.nextId++;
    const request: ThreadRequest = { id, method, args: [...args], traceId: getTraceContext()?.traceId };

    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { method, resolve, reject });
      try {
        worker.postMessage(request);
      } catch (error) {
        this.pending.delete(id);
        reject(toError(error));
      }
    });
  }

  get running(): boolean {
    return this.worker !== null;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Stop the thread; calls still in flight are rejected.
   */
  async terminate(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;
    this.stoppedReason ??= new Error("backend thread stopped");
    await worker.terminate();
    await this.exited;
  }

  private handleReply(message: unknown): void {
    const parsed = ThreadReplySchema.safeParse(message);
    if (!parsed.success) {
      log.error({ issues: parsed.error.issues.map((i) => i.message) }, "Malformed reply from backend thread");
      return;
    }

    const reply = parsed.data;
    const waiter = this.pending.get(reply.id);
    if (!waiter) {
      log.warn({ id: reply.id }, "Reply for a call that is no longer pending");
      return;
    }
    this.pending.delete(reply.id);

    if (reply.ok) {
      waiter.resolve(reply.value);
    } else {
      waiter.reject(this.revive(reply.error));
    }
  }

  private failPending(error: Error): void {
    for (const [id, waiter] of this.pending) {
      log.warn({ id, method: waiter.method }, "Call lost with its backend thread");
      waiter.reject(error);
    }
    this.pending.clear();
  }
}
