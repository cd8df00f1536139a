/**
 * SerialBridge - async-facing side of the worker loop
 *
 * Callers submit an Operation and get back a CallOutcome. Only the calling
 * async context suspends while the worker runs the operation; the outcome
 * is always a value, never a rejection:
 * - not ready  -> fails fast, nothing is queued
 * - completed  -> the result, or the operation's error tagged with its name
 * - timed out  -> the call stays queued and still runs; its result is dropped
 */

import {
  createComponentLogger,
  getTraceContext,
  recordLateResult,
  setQueueDepth,
  startCallTimer,
} from "../observability/index.ts";
import {
  BackendOperationError,
  BridgeTimeoutError,
  NotReadyError,
} from "./errors.ts";
import { PendingCall, type Operation } from "./pending_call.ts";
import {
  WorkerLoop,
  type ManagedBackend,
  type WorkerLoopOptions,
  type WorkerState,
} from "./worker_loop.ts";

const log = createComponentLogger("serial-bridge");

export type CallOutcome<R> =
  | { status: "ok"; value: R }
  | { status: "error"; error: BackendOperationError }
  | { status: "timeout"; error: BridgeTimeoutError }
  | { status: "not_ready"; error: NotReadyError };

export type SerialBridgeOptions<B> = WorkerLoopOptions<B>;

export class SerialBridge<B extends ManagedBackend> {
  private readonly worker: WorkerLoop<B>;

  constructor(options: SerialBridgeOptions<B>) {
    const observer = options.onSettled;
    this.worker = new WorkerLoop<B>({
      ...options,
      onSettled: (call) => {
        setQueueDepth(this.worker.queueDepth);
        if (call.abandoned) {
          recordLateResult(call.name);
        }
        observer?.(call);
      },
    });
  }

  start(): void {
    this.worker.start();
  }

  whenReady(timeoutMs: number): Promise<boolean> {
    return this.worker.whenReady(timeoutMs);
  }

  /**
   * Run `operation` on the worker and wait at most `timeoutMs` for it.
   */
  async submit<A extends readonly unknown[], R>(
    operation: Operation<B, A, R>,
    timeoutMs: number
  ): Promise<CallOutcome<R>> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive finite number, got ${timeoutMs}`);
    }

    const finish = startCallTimer(operation.name);

    if (!this.worker.ready) {
      finish("not_ready");
      log.warn({ operation: operation.name, state: this.worker.state }, "Backend not ready");
      return { status: "not_ready", error: new NotReadyError(operation.name) };
    }

    const call = PendingCall.of(operation, getTraceContext()?.traceId);
    this.worker.enqueue(call);
    setQueueDepth(this.worker.queueDepth);

    const completed = await call.wait(timeoutMs);
    const settlement = call.settlement;

    if (!completed || !settlement) {
      call.abandon();
      finish("timeout");
      log.error({ operation: operation.name, timeoutMs }, "Bridge call timed out");
      return { status: "timeout", error: new BridgeTimeoutError(operation.name, timeoutMs) };
    }

    if (!settlement.ok) {
      finish("error");
      return { status: "error", error: new BackendOperationError(operation.name, settlement.error) };
    }

    finish("ok");
    return { status: "ok", value: settlement.value };
  }

  /**
   * Shut the worker down after the calls already queued have drained.
   * Idempotent and safe before start().
   */
  async close(): Promise<void> {
    await this.worker.stop();
  }

  get ready(): boolean {
    return this.worker.ready;
  }

  get state(): WorkerState {
    return this.worker.state;
  }

  get queueDepth(): number {
    return this.worker.queueDepth;
  }
}
