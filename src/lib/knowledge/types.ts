/**
 * Knowledge base contract
 *
 * Result shapes are pinned down as zod schemas; operations running on the
 * worker parse every backend result against them, so a backend that drifts
 * from the contract fails the one call instead of leaking odd shapes to
 * callers.
 */

import { z } from "zod";
import type { Awaitable, ManagedBackend } from "../bridge/index.ts";

export const ROOT_URI = "kb://";
export const RESOURCES_URI = "kb://resources/";
export const MEMORIES_URI = "kb://memories/";

export const MemoryHitSchema = z.object({
  uri: z.string(),
  content: z.string(),
  sessionId: z.string().optional(),
  score: z.number(),
});

export const ResourceHitSchema = z.object({
  uri: z.string(),
  title: z.string(),
  abstract: z.string(),
  content: z.string().optional(),
  score: z.number(),
});

export const SearchResultSchema = z.object({
  total: z.number().int().nonnegative(),
  memories: z.array(MemoryHitSchema),
  resources: z.array(ResourceHitSchema),
});

export const AddResourceStatusSchema = z.enum(["success", "accepted", "partial", "failed"]);

export const AddResourceResultSchema = z.object({
  status: AddResourceStatusSchema,
  errors: z.array(z.string()),
  rootUri: z.string(),
});

export const DirEntrySchema = z.object({
  name: z.string(),
  uri: z.string(),
  isDir: z.boolean(),
  size: z.number().int().nonnegative(),
});

export const SessionInfoSchema = z.object({
  sessionId: z.string(),
  createdAt: z.number(),
  memoryCount: z.number().int().nonnegative(),
});

export const MemoryRecordSchema = z.object({
  uri: z.string(),
  sessionId: z.string().optional(),
});

export type MemoryHit = z.infer<typeof MemoryHitSchema>;
export type ResourceHit = z.infer<typeof ResourceHitSchema>;
export type SearchResult = z.infer<typeof SearchResultSchema>;
export type AddResourceStatus = z.infer<typeof AddResourceStatusSchema>;
export type AddResourceResult = z.infer<typeof AddResourceResultSchema>;
export type DirEntry = z.infer<typeof DirEntrySchema>;
export type SessionInfo = z.infer<typeof SessionInfoSchema>;
export type MemoryRecord = z.infer<typeof MemoryRecordSchema>;

export const AddResourceOptionsSchema = z.object({
  /** Index content before returning; otherwise defer it to the next call */
  wait: z.boolean(),
  /** Budget for ingestion, in milliseconds */
  timeoutMs: z.number(),
});

export type AddResourceOptions = z.infer<typeof AddResourceOptionsSchema>;

/**
 * A knowledge base that must only be driven from one context at a time.
 * Every method may block; the bridge worker is the only caller.
 */
export interface KnowledgeBackend extends ManagedBackend {
  search(query: string, limit: number): Awaitable<SearchResult>;
  find(query: string, limit: number): Awaitable<SearchResult>;
  addResource(path: string, options: AddResourceOptions): Awaitable<AddResourceResult>;
  ls(uri: string): Awaitable<DirEntry[]>;
  read(uri: string): Awaitable<string>;
  abstract(uri: string): Awaitable<string>;
  listSessions(): Awaitable<SessionInfo[]>;
  addMemory(content: string, sessionId?: string): Awaitable<MemoryRecord>;
}

export const KnowledgeErrorCodeSchema = z.enum([
  "NOT_INITIALIZED",
  "NOT_FOUND",
  "INVALID_URI",
  "NOT_A_FILE",
  "NOT_A_DIRECTORY",
  "INGEST_TIMEOUT",
]);

export type KnowledgeErrorCode = z.infer<typeof KnowledgeErrorCodeSchema>;

export class KnowledgeBaseError extends Error {
  readonly code: KnowledgeErrorCode;

  constructor(code: KnowledgeErrorCode, message: string) {
    super(message);
    this.name = "KnowledgeBaseError";
    this.code = code;
  }
}
