// Thread side of ThreadHost. Requests are answered strictly one at a time,
// in arrival order, so the backend behind the handler is never re-entered.

import { parentPort, workerData, type MessagePort } from "node:worker_threads";
import { z } from "zod";
import { createComponentLogger, withTraceAsync } from "../observability/index.ts";
import { extractErrorMessage, toError } from "./errors.ts";
import type { Awaitable } from "./pending_call.ts";
import { ThreadRequestSchema, type RemoteError, type ThreadReply } from "./thread_protocol.ts";

const log = createComponentLogger("thread-server");

export type ThreadHandler = (method: string, args: unknown[]) => Awaitable<unknown>;

const WorkerDataSchema = z.object({ data: z.unknown() });

/**
 * The `data` option given to the ThreadHost that started this thread
 */
export function threadData(): unknown {
  const parsed = WorkerDataSchema.safeParse(workerData);
  return parsed.success ? parsed.data.data : undefined;
}

export function serializeError(error: unknown): RemoteError {
  const err = toError(error);
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  return { name: err.name, message: extractErrorMessage(error), ...(code !== undefined && { code }) };
}

export function serveInThread(handler: ThreadHandler): void {
  const port = parentPort;
  if (!port) {
    throw new Error("serveInThread() must run inside a worker thread");
  }

  let chain: Promise<void> = Promise.resolve();
  port.on("message", (message: unknown) => {
    chain = chain
      .then(() => answer(port, handler, message))
      .catch((error: unknown) => log.error({ err: toError(error) }, "Failed to answer request"));
  });
}

async function answer(port: MessagePort, handler: ThreadHandler, message: unknown): Promise<void> {
  const parsed = ThreadRequestSchema.safeParse(message);
  if (!parsed.success) {
    log.error("Malformed request from main thread");
    return;
  }

  const { id, method, args, traceId } = parsed.data;
  let reply: ThreadReply;
  try {
    const run = async () => handler(method, args);
    const value = traceId ? await withTraceAsync(traceId, run, method) : await run();
    reply = { id, ok: true, value };
  } catch (error) {
    reply = { id, ok: false, error: serializeError(error) };
  }

  try {
    port.postMessage(reply);
  } catch (error) {
    // Result could not be cloned; the caller still gets an answer
    port.postMessage({ id, ok: false, error: serializeError(error) } satisfies ThreadReply);
  }
}
