/**
 * ThreadedKnowledgeBase
 *
 * KnowledgeBackend whose database lives in its own worker thread. The bridge
 * worker still drives it one call at a time; each call now awaits a reply
 * instead of running synchronously, so a slow query never holds up the
 * event loop serving other callers. Replies are validated here because they
 * arrive as plain cloned data.
 */

import { z } from "zod";
import { ThreadHost, serveInThread, type RemoteError } from "../bridge/index.ts";
import {
  AddResourceOptionsSchema,
  AddResourceResultSchema,
  DirEntrySchema,
  KnowledgeBaseError,
  KnowledgeErrorCodeSchema,
  MemoryRecordSchema,
  SearchResultSchema,
  SessionInfoSchema,
  type AddResourceOptions,
  type AddResourceResult,
  type DirEntry,
  type KnowledgeBackend,
  type MemoryRecord,
  type SearchResult,
  type SessionInfo,
} from "./types.ts";

export const SQLITE_WORKER_ENTRY = new URL("./sqlite_worker.ts", import.meta.url);

export const KnowledgeThreadDataSchema = z.object({ dbPath: z.string() });

export type KnowledgeThreadData = z.infer<typeof KnowledgeThreadDataSchema>;

export interface ThreadedKnowledgeBaseOptions extends KnowledgeThreadData {
  /** Thread entry; defaults to the SQLite worker */
  entry?: URL;
}

function reviveKnowledgeError(error: RemoteError): Error {
  const code = KnowledgeErrorCodeSchema.safeParse(error.code);
  if (code.success) {
    return new KnowledgeBaseError(code.data, error.message);
  }
  const revived = new Error(error.message);
  revived.name = error.name;
  return revived;
}

export class ThreadedKnowledgeBase implements KnowledgeBackend {
  private readonly host: ThreadHost;

  constructor(options: ThreadedKnowledgeBaseOptions) {
    const data: KnowledgeThreadData = { dbPath: options.dbPath };
    this.host = new ThreadHost({
      entry: options.entry ?? SQLITE_WORKER_ENTRY,
      data,
      reviveError: reviveKnowledgeError,
    });
  }

  async initialize(): Promise<void> {
    this.host.spawn();
    await this.host.call("initialize", []);
  }

  async close(): Promise<void> {
    try {
      if (this.host.running) {
        await this.host.call("close", []);
      }
    } finally {
      await this.host.terminate();
    }
  }

  async search(query: string, limit: number): Promise<SearchResult> {
    return SearchResultSchema.parse(await this.host.call("search", [query, limit]));
  }

  async find(query: string, limit: number): Promise<SearchResult> {
    return SearchResultSchema.parse(await this.host.call("find", [query, limit]));
  }

  async addResource(path: string, options: AddResourceOptions): Promise<AddResourceResult> {
    return AddResourceResultSchema.parse(await this.host.call("addResource", [path, options]));
  }

  async ls(uri: string): Promise<DirEntry[]> {
    return DirEntrySchema.array().parse(await this.host.call("ls", [uri]));
  }

  async read(uri: string): Promise<string> {
    return z.string().parse(await this.host.call("read", [uri]));
  }

  async abstract(uri: string): Promise<string> {
    return z.string().parse(await this.host.call("abstract", [uri]));
  }

  async listSessions(): Promise<SessionInfo[]> {
    return SessionInfoSchema.array().parse(await this.host.call("listSessions", []));
  }

  async addMemory(content: string, sessionId?: string): Promise<MemoryRecord> {
    return MemoryRecordSchema.parse(await this.host.call("addMemory", [content, sessionId]));
  }
}

// ============== Thread side ==============

const NoArgs = z.tuple([]);
const QueryArgs = z.tuple([z.string(), z.number()]);
const UriArgs = z.tuple([z.string()]);
const AddResourceArgs = z.tuple([z.string(), AddResourceOptionsSchema]);
const AddMemoryArgs = z.tuple([z.string(), z.string().optional()]);

/**
 * Answer ThreadedKnowledgeBase requests from inside a worker thread
 */
export function serveKnowledgeBase(kb: KnowledgeBackend): void {
  serveInThread((method, args) => {
    switch (method) {
      case "initialize":
        NoArgs.parse(args);
        return kb.initialize();
      case "close":
        NoArgs.parse(args);
        return kb.close();
      case "search": {
        const [query, limit] = QueryArgs.parse(args);
        return kb.search(query, limit);
      }
      case "find": {
        const [query, limit] = QueryArgs.parse(args);
        return kb.find(query, limit);
      }
      case "addResource": {
        const [path, options] = AddResourceArgs.parse(args);
        return kb.addResource(path, options);
      }
      case "ls":
        return kb.ls(UriArgs.parse(args)[0]);
      case "read":
        return kb.read(UriArgs.parse(args)[0]);
      case "abstract":
        return kb.abstract(UriArgs.parse(args)[0]);
      case "listSessions":
        NoArgs.parse(args);
        return kb.listSessions();
      case "addMemory": {
        const [content, sessionId] = AddMemoryArgs.parse(args);
        return kb.addMemory(content, sessionId);
      }
      default:
        throw new Error(`unknown knowledge base method: ${method}`);
    }
  });
}
