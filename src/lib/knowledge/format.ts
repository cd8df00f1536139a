// Text renderings of backend results, as returned to HTTP, CLI and MCP callers.

import type {
  AddResourceResult,
  DirEntry,
  MemoryHit,
  ResourceHit,
  SearchResult,
  SessionInfo,
} from "./types.ts";

const ENTRY_PREVIEW_CHARS = 300;
const CONTEXT_PREVIEW_CHARS = 500;
const READ_LIMIT_CHARS = 2000;
const SESSION_LIST_LIMIT = 20;
const CONTEXT_ITEMS_PER_KIND = 3;

function resourceText(res: ResourceHit): string {
  return res.content || res.abstract;
}

function formatEntries(memories: MemoryHit[], resources: ResourceHit[]): string[] {
  return [
    ...memories.map((mem) => `[memory] ${mem.content.slice(0, ENTRY_PREVIEW_CHARS)}`),
    ...resources.map(
      (res) => `[resource:${res.uri}] ${resourceText(res).slice(0, ENTRY_PREVIEW_CHARS)}`
    ),
  ];
}

export function formatSearch(query: string, results: SearchResult): string {
  const entries = formatEntries(results.memories, results.resources);
  if (entries.length === 0) {
    return `No results for '${query}' (total=${results.total})`;
  }
  return `Found ${results.total} results for '${query}':\n\n${entries.join("\n\n")}`;
}

export function formatFind(query: string, results: SearchResult): string {
  const entries = formatEntries(results.memories, results.resources);
  if (results.total === 0 || entries.length === 0) {
    return `No deep-search results for '${query}'`;
  }
  return `Deep search '${query}' found ${results.total}:\n\n${entries.join("\n\n")}`;
}

export function formatAddResource(result: AddResourceResult): string {
  if (result.status === "failed") {
    const reason = result.errors.length > 0 ? result.errors.join(", ") : "unknown error";
    return `Failed to add resource: ${reason}`;
  }
  const added = `Resource added: ${result.rootUri} (status=${result.status})`;
  return result.errors.length > 0 ? `${added}; skipped: ${result.errors.join(", ")}` : added;
}

export function formatListing(uri: string, entries: DirEntry[]): string {
  if (entries.length === 0) {
    return `Directory ${uri} is empty`;
  }
  const lines = entries.map(
    (entry) => `  [${entry.isDir ? "D" : "F"}] ${entry.name} (${entry.size}b)`
  );
  return `Directory ${uri}:\n${lines.join("\n")}`;
}

export function formatRead(content: string): string {
  return content.length > READ_LIMIT_CHARS ? content.slice(0, READ_LIMIT_CHARS) : content;
}

export function formatSessions(sessions: SessionInfo[]): string {
  if (sessions.length === 0) {
    return "No sessions recorded";
  }
  const lines = sessions.slice(0, SESSION_LIST_LIMIT).map((s) => `  - ${s.sessionId}`);
  return `Sessions:\n${lines.join("\n")}`;
}

/**
 * Compact context block for prompt augmentation. Empty string when nothing matched.
 */
export function formatContext(results: SearchResult): string {
  const parts: string[] = [];

  for (const mem of results.memories.slice(0, CONTEXT_ITEMS_PER_KIND)) {
    if (mem.content) {
      parts.push(`[memory] ${mem.content}`);
    }
  }

  for (const res of results.resources.slice(0, CONTEXT_ITEMS_PER_KIND)) {
    const text = resourceText(res);
    if (text) {
      parts.push(`[kb:${res.title || res.uri}] ${text.slice(0, CONTEXT_PREVIEW_CHARS)}`);
    }
  }

  return parts.join("\n\n");
}
