import { IllegalStateError } from "./errors.ts";

export type Awaitable<T> = T | Promise<T>;

/**
 * One unit of backend work. The worker loop supplies the backend as the
 * first argument; the callable never captures it.
 */
export interface Operation<B, A extends readonly unknown[], R> {
  readonly name: string;
  readonly callable: (backend: B, ...args: A) => Awaitable<R>;
  readonly args: A;
}

export function defineOperation<B, A extends readonly unknown[], R>(
  name: string,
  callable: (backend: B, ...args: A) => Awaitable<R>,
  ...args: A
): Operation<B, A, R> {
  return Object.freeze({ name, callable, args: Object.freeze(args) });
}

export type Settlement<R> =
  | { readonly ok: true; readonly value: R }
  | { readonly ok: false; readonly error: Error };

/**
 * The tracked handle of one submitted operation.
 *
 * The submitting caller creates it and keeps a reference for reading; once
 * enqueued only the worker loop settles it. Settlement happens exactly once
 * (result or error, never both), after which `completion` resolves.
 */
export class PendingCall<B, R> {
  readonly name: string;
  readonly args: readonly unknown[];
  readonly traceId?: string;
  readonly submittedAt = Date.now();

  private readonly invoke: (backend: B) => Awaitable<R>;
  private outcome: Settlement<R> | null = null;
  private readonly markCompleted: () => void;
  private isAbandoned = false;

  /** Resolves (never rejects) once the call has a result or an error */
  readonly completion: Promise<void>;

  private constructor(
    name: string,
    args: readonly unknown[],
    invoke: (backend: B) => Awaitable<R>,
    traceId?: string
  ) {
    this.name = name;
    this.args = args;
    this.invoke = invoke;
    this.traceId = traceId;
    let markCompleted: () => void = () => undefined;
    this.completion = new Promise<void>((resolve) => {
      markCompleted = resolve;
    });
    this.markCompleted = markCompleted;
  }

  static of<B, A extends readonly unknown[], R>(
    operation: Operation<B, A, R>,
    traceId?: string
  ): PendingCall<B, R> {
    const { callable, args } = operation;
    return new PendingCall<B, R>(
      operation.name,
      args,
      (backend) => callable(backend, ...args),
      traceId
    );
  }

  /**
   * Run the operation against the backend. Only the worker loop calls this.
   */
  async execute(backend: B): Promise<R> {
    return this.invoke(backend);
  }

  resolve(value: R): void {
    this.settle({ ok: true, value });
  }

  reject(error: Error): void {
    this.settle({ ok: false, error });
  }

  private settle(outcome: Settlement<R>): void {
    if (this.outcome) {
      throw new IllegalStateError(`PendingCall ${this.name} settled twice`);
    }
    this.outcome = outcome;
    this.markCompleted();
  }

  /**
   * Wait for completion for at most `timeoutMs`.
   * Resolves true if the call completed in time, false otherwise.
   */
  async wait(timeoutMs: number): Promise<boolean> {
    if (this.outcome) return true;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([this.completion.then(() => true as const), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Mark that the caller stopped waiting. The call stays queued and still runs.
   */
  abandon(): void {
    this.isAbandoned = true;
  }

  get completed(): boolean {
    return this.outcome !== null;
  }

  /** The result or error, once the worker has settled the call */
  get settlement(): Settlement<R> | null {
    return this.outcome;
  }

  get abandoned(): boolean {
    return this.isAbandoned;
  }

  get result(): R | undefined {
    const outcome = this.outcome;
    return outcome && outcome.ok ? outcome.value : undefined;
  }

  get error(): Error | undefined {
    const outcome = this.outcome;
    return outcome && !outcome.ok ? outcome.error : undefined;
  }
}
