export { DispatchQueue, EMPTY, type Empty } from "./dispatch_queue.ts";
export {
  BridgeError,
  NotReadyError,
  BackendOperationError,
  BackendInitError,
  BridgeTimeoutError,
  IllegalStateError,
  extractErrorMessage,
  toError,
  type BridgeErrorCode,
} from "./errors.ts";
export {
  PendingCall,
  defineOperation,
  type Awaitable,
  type Operation,
  type Settlement,
} from "./pending_call.ts";
export {
  WorkerLoop,
  SENTINEL,
  type ManagedBackend,
  type WorkerLoopOptions,
  type WorkerState,
} from "./worker_loop.ts";
export { SerialBridge, type CallOutcome, type SerialBridgeOptions } from "./serial_bridge.ts";
export { ThreadHost, type ThreadHostOptions } from "./thread_host.ts";
export { serveInThread, threadData, serializeError, type ThreadHandler } from "./thread_server.ts";
export type { RemoteError, ThreadReply, ThreadRequest } from "./thread_protocol.ts";
