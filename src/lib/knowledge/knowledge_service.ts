/**
 * KnowledgeService
 *
 * Async facade over a single-context knowledge backend. Every public
 * operation is queued on the bridge worker with its own timeout budget and
 * always resolves to something printable: the formatted result, or a
 * degraded message when the backend is not ready, too slow, or failed.
 *
 * Formatting happens inside the operation, on the worker, so the backend's
 * raw results never leave it.
 */

import { existsSync } from "node:fs";
import { z } from "zod";
import {
  SerialBridge,
  defineOperation,
  extractErrorMessage,
  type Operation,
  type WorkerState,
} from "../bridge/index.ts";
import { createComponentLogger } from "../observability/index.ts";
import {
  formatAddResource,
  formatContext,
  formatFind,
  formatListing,
  formatRead,
  formatSearch,
  formatSessions,
} from "./format.ts";
import {
  AddResourceResultSchema,
  DirEntrySchema,
  MemoryRecordSchema,
  RESOURCES_URI,
  SearchResultSchema,
  SessionInfoSchema,
  type KnowledgeBackend,
} from "./types.ts";

const log = createComponentLogger("knowledge-service");

export const NOT_INITIALIZED_MESSAGE = "Knowledge base not initialized";

export interface OperationTimeouts {
  search: number;
  find: number;
  add_resource: number;
  ls: number;
  read: number;
  abstract: number;
  list_sessions: number;
  retrieve_context: number;
  add_memory: number;
}

/** Reads get short budgets; writes and deep searches get long ones */
export const DEFAULT_TIMEOUTS: OperationTimeouts = {
  search: 15000,
  find: 30000,
  add_resource: 120000,
  ls: 15000,
  read: 15000,
  abstract: 15000,
  list_sessions: 15000,
  retrieve_context: 10000,
  add_memory: 120000,
};

export interface KnowledgeServiceOptions {
  createBackend: () => KnowledgeBackend;
  timeouts?: Partial<OperationTimeouts>;
  pollIntervalMs?: number;
}

interface Degraded {
  timeout: string;
  failure: (message: string) => string;
  notReady?: string;
}

type KbOperation<A extends readonly unknown[]> = Operation<KnowledgeBackend, A, string>;

// ============== Operations (run on the worker) ==============

const searchOp = (query: string, limit: number): KbOperation<[string, number]> =>
  defineOperation(
    "search",
    async (kb: KnowledgeBackend, q: string, n: number) =>
      formatSearch(q, SearchResultSchema.parse(await kb.search(q, n))),
    query,
    limit
  );

const findOp = (query: string, limit: number): KbOperation<[string, number]> =>
  defineOperation(
    "find",
    async (kb: KnowledgeBackend, q: string, n: number) =>
      formatFind(q, SearchResultSchema.parse(await kb.find(q, n))),
    query,
    limit
  );

const addResourceOp = (path: string, ingestTimeoutMs: number): KbOperation<[string, number]> =>
  defineOperation(
    "add_resource",
    async (kb: KnowledgeBackend, p: string, timeoutMs: number) => {
      if (!existsSync(p)) {
        return `File not found: ${p}`;
      }
      const result = await kb.addResource(p, { wait: true, timeoutMs });
      return formatAddResource(AddResourceResultSchema.parse(result));
    },
    path,
    ingestTimeoutMs
  );

const lsOp = (uri: string): KbOperation<[string]> =>
  defineOperation(
    "ls",
    async (kb: KnowledgeBackend, u: string) =>
      formatListing(u, DirEntrySchema.array().parse(await kb.ls(u))),
    uri
  );

const readOp = (uri: string): KbOperation<[string]> =>
  defineOperation(
    "read",
    async (kb: KnowledgeBackend, u: string) => formatRead(z.string().parse(await kb.read(u))),
    uri
  );

const abstractOp = (uri: string): KbOperation<[string]> =>
  defineOperation(
    "abstract",
    async (kb: KnowledgeBackend, u: string) => z.string().parse(await kb.abstract(u)),
    uri
  );

const listSessionsOp = (): KbOperation<[]> =>
  defineOperation("list_sessions", async (kb: KnowledgeBackend) =>
    formatSessions(SessionInfoSchema.array().parse(await kb.listSessions()))
  );

const retrieveContextOp = (query: string, limit: number): KbOperation<[string, number]> =>
  defineOperation(
    "retrieve_context",
    async (kb: KnowledgeBackend, q: string, n: number) =>
      formatContext(SearchResultSchema.parse(await kb.search(q, n))),
    query,
    limit
  );

const addMemoryOp = (content: string, sessionId: string | undefined): KbOperation<[string, string | undefined]> =>
  defineOperation(
    "add_memory",
    async (kb: KnowledgeBackend, c: string, s: string | undefined) => {
      const record = MemoryRecordSchema.parse(await kb.addMemory(c, s));
      return record.sessionId
        ? `Memory stored: ${record.uri} (session=${record.sessionId})`
        : `Memory stored: ${record.uri}`;
    },
    content,
    sessionId
  );

// ============== Facade ==============

export class KnowledgeService {
  private readonly bridge: SerialBridge<KnowledgeBackend>;
  private readonly timeouts: OperationTimeouts;

  constructor(options: KnowledgeServiceOptions) {
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.bridge = new SerialBridge<KnowledgeBackend>({
      createBackend: options.createBackend,
      pollIntervalMs: options.pollIntervalMs,
    });
  }

  /**
   * Start the worker; the backend is initialized on its first iteration.
   */
  start(): void {
    this.bridge.start();
  }

  whenReady(timeoutMs: number): Promise<boolean> {
    return this.bridge.whenReady(timeoutMs);
  }

  get ready(): boolean {
    return this.bridge.ready;
  }

  get workerState(): WorkerState {
    return this.bridge.state;
  }

  get queueDepth(): number {
    return this.bridge.queueDepth;
  }

  async search(query: string, limit = 5): Promise<string> {
    return this.run(searchOp(query, limit), this.timeouts.search, {
      timeout: `Search '${query}' timed out`,
      failure: (msg) => `Search '${query}' failed: ${msg}`,
    });
  }

  async find(query: string, limit = 10): Promise<string> {
    return this.run(findOp(query, limit), this.timeouts.find, {
      timeout: `Deep search '${query}' timed out`,
      failure: (msg) => `Deep search '${query}' failed: ${msg}`,
    });
  }

  async addResource(path: string): Promise<string> {
    const budget = this.timeouts.add_resource;
    return this.run(addResourceOp(path, budget), budget, {
      timeout: "Adding resource timed out",
      failure: (msg) => `Failed to add resource: ${msg}`,
    });
  }

  async ls(uri: string = RESOURCES_URI): Promise<string> {
    return this.run(lsOp(uri), this.timeouts.ls, {
      timeout: `Listing ${uri} timed out`,
      failure: (msg) => `Listing ${uri} failed: ${msg}`,
    });
  }

  async read(uri: string): Promise<string> {
    return this.run(readOp(uri), this.timeouts.read, {
      timeout: "Read timed out",
      failure: (msg) => `Read failed: ${msg}`,
    });
  }

  async abstract(uri: string): Promise<string> {
    return this.run(abstractOp(uri), this.timeouts.abstract, {
      timeout: "Abstract timed out",
      failure: (msg) => `Abstract failed: ${msg}`,
    });
  }

  async listSessions(): Promise<string> {
    return this.run(listSessionsOp(), this.timeouts.list_sessions, {
      timeout: "Listing sessions timed out",
      failure: (msg) => `Listing sessions failed: ${msg}`,
    });
  }

  /**
   * Context block for prompt augmentation; empty string whenever nothing usable came back.
   */
  async retrieveContext(query: string, limit = 3): Promise<string> {
    return this.run(retrieveContextOp(query, limit), this.timeouts.retrieve_context, {
      timeout: "",
      failure: () => "",
      notReady: "",
    });
  }

  async addMemory(content: string, sessionId?: string): Promise<string> {
    return this.run(addMemoryOp(content, sessionId), this.timeouts.add_memory, {
      timeout: "Storing memory timed out",
      failure: (msg) => `Failed to store memory: ${msg}`,
    });
  }

  /**
   * Stop the worker once queued calls have drained; the worker closes the backend.
   */
  async close(): Promise<void> {
    await this.bridge.close();
    log.info("Knowledge service closed");
  }

  private async run<A extends readonly unknown[]>(
    operation: KbOperation<A>,
    timeoutMs: number,
    degraded: Degraded
  ): Promise<string> {
    const outcome = await this.bridge.submit(operation, timeoutMs);

    switch (outcome.status) {
      case "ok":
        return outcome.value;
      case "not_ready":
        return degraded.notReady ?? NOT_INITIALIZED_MESSAGE;
      case "timeout":
        log.warn({ operation: operation.name, timeoutMs }, "Returning degraded result after timeout");
        return degraded.timeout;
      case "error":
        return degraded.failure(extractErrorMessage(outcome.error.cause));
    }
  }
}
