// SQLite-backed knowledge base.
// better-sqlite3 is synchronous: every call blocks until the database answers,
// and the connection must be used from one context at a time. The server runs
// it inside its own worker thread (sqlite_worker.ts) behind ThreadedKnowledgeBase.

import Database from "better-sqlite3";
import { existsSync, mkdirSync, readdirSync, readFileSync, statSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { createComponentLogger } from "../observability/index.ts";
import {
  KnowledgeBaseError,
  MEMORIES_URI,
  RESOURCES_URI,
  ROOT_URI,
  type AddResourceOptions,
  type AddResourceResult,
  type DirEntry,
  type KnowledgeBackend,
  type MemoryHit,
  type MemoryRecord,
  type ResourceHit,
  type SearchResult,
  type SessionInfo,
} from "./types.ts";

const log = createComponentLogger("sqlite-kb");

const ABSTRACT_CHARS = 200;
const HIT_CONTENT_CHARS = 2000;
const OVERVIEW_NAMES = 5;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS resources (
    uri TEXT PRIMARY KEY,
    parent_uri TEXT NOT NULL,
    name TEXT NOT NULL,
    is_dir INTEGER NOT NULL,
    size INTEGER NOT NULL DEFAULT 0,
    title TEXT NOT NULL DEFAULT '',
    abstract TEXT NOT NULL DEFAULT '',
    content TEXT,
    source_path TEXT,
    indexed INTEGER NOT NULL DEFAULT 1,
    added_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_resources_parent ON resources(parent_uri);

  CREATE TABLE IF NOT EXISTS memories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    content TEXT NOT NULL,
    session_id TEXT,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sessions (
    session_id TEXT PRIMARY KEY,
    created_at INTEGER NOT NULL
  );
`;

interface ResourceRow {
  uri: string;
  parent_uri: string;
  name: string;
  is_dir: number;
  size: number;
  title: string;
  abstract: string;
  content: string | null;
  source_path: string | null;
  indexed: number;
}

interface MemoryRow {
  id: number;
  content: string;
  session_id: string | null;
}

interface SessionRow {
  session_id: string;
  created_at: number;
  memory_count: number;
}

interface TreeEntry {
  uri: string;
  parentUri: string;
  name: string;
  isDir: boolean;
  sourcePath: string;
  size: number;
}

export interface SqliteKnowledgeBaseOptions {
  /** Database file, or ":memory:" */
  dbPath: string;
  clock?: () => number;
}

export class SqliteKnowledgeBase implements KnowledgeBackend {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly clock: () => number;

  constructor(options: SqliteKnowledgeBaseOptions) {
    this.dbPath = options.dbPath;
    this.clock = options.clock ?? Date.now;
  }

  initialize(): void {
    if (this.db) return;

    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(SCHEMA);
    this.db = db;
    log.info({ dbPath: this.dbPath }, "Knowledge base opened");
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      log.info("Knowledge base closed");
    }
  }

  // ============== Ingestion ==============

  addResource(path: string, options: AddResourceOptions): AddResourceResult {
    const db = this.open();

    if (!existsSync(path)) {
      return { status: "failed", errors: [`path does not exist: ${path}`], rootUri: "" };
    }

    const started = this.clock();
    const rootPath = resolve(path);
    const rootName = basename(rootPath);
    const rootIsDir = statSync(rootPath).isDirectory();
    const rootUri = `${RESOURCES_URI}${rootName}${rootIsDir ? "/" : ""}`;

    const tree: TreeEntry[] = [];
    collectTree(rootPath, rootUri, RESOURCES_URI, tree);

    const errors: string[] = [];
    const insert = db.prepare<
      [string, string, string, number, number, string, string, string | null, string, number, number]
    >(
      `INSERT INTO resources (
        uri, parent_uri, name, is_dir, size, title, abstract, content, source_path, indexed, added_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    let indexedFiles = 0;
    let timedOut = false;

    db.transaction(() => {
      // Exact, case-sensitive prefix match on the root uri
      const prefix = rootIsDir ? rootUri : `${rootUri}/`;
      db.prepare<[string, string, string]>(
        `DELETE FROM resources WHERE uri = ? OR substr(uri, 1, length(?)) = ?`
      ).run(rootUri, prefix, prefix);

      for (const entry of tree) {
        if (entry.isDir) {
          insert.run(entry.uri, entry.parentUri, entry.name, 1, 0, entry.name, "", null, entry.sourcePath, 1, started);
          continue;
        }

        if (!options.wait) {
          insert.run(entry.uri, entry.parentUri, entry.name, 0, entry.size, entry.name, "", null, entry.sourcePath, 0, started);
          continue;
        }

        if (timedOut) continue;
        if (this.clock() - started > options.timeoutMs) {
          timedOut = true;
          errors.push(`INGEST_TIMEOUT: ingestion exceeded ${options.timeoutMs}ms`);
          continue;
        }

        const doc = readDocument(entry.sourcePath);
        if (!doc) {
          errors.push(`skipped binary file: ${entry.sourcePath}`);
          continue;
        }
        insert.run(
          entry.uri, entry.parentUri, entry.name, 0, entry.size,
          doc.title || entry.name, doc.abstract, doc.content, entry.sourcePath, 1, started
        );
        indexedFiles++;
      }
    })();

    const fileCount = tree.filter((e) => !e.isDir).length;
    log.info({ rootUri, files: fileCount, indexed: indexedFiles, wait: options.wait }, "Resource added");

    if (!options.wait) {
      return { status: "accepted", errors, rootUri };
    }
    if (errors.length > 0) {
      return { status: indexedFiles > 0 ? "partial" : "failed", errors, rootUri };
    }
    return { status: "success", errors, rootUri };
  }

  addMemory(content: string, sessionId?: string): MemoryRecord {
    const db = this.open();
    const now = this.clock();

    const id = db.transaction(() => {
      if (sessionId) {
        db.prepare<[string, number]>(
          `INSERT OR IGNORE INTO sessions (session_id, created_at) VALUES (?, ?)`
        ).run(sessionId, now);
      }
      const info = db
        .prepare<[string, string | null, number]>(
          `INSERT INTO memories (content, session_id, created_at) VALUES (?, ?, ?)`
        )
        .run(content, sessionId ?? null, now);
      return Number(info.lastInsertRowid);
    })();

    return { uri: `${MEMORIES_URI}${id}`, ...(sessionId && { sessionId }) };
  }

  // ============== Retrieval ==============

  search(query: string, limit: number): SearchResult {
    const db = this.open();
    const terms = tokenize(query);
    if (terms.length === 0) {
      return { total: 0, memories: [], resources: [] };
    }

    const memories = this.matchMemories(db, terms);
    const resources = this.loadResources(db, "is_dir = 0")
      .map((row) => ({ row, score: scoreText(terms, resourceText(row), row.title) }))
      .filter((hit) => hit.score > 0)
      .map(({ row, score }) => toResourceHit(row, score));

    return paginate(memories, sortHits(resources), limit);
  }

  /**
   * Deep search: also matches URIs and directory names, and expands matching
   * directories to every file beneath them.
   */
  find(query: string, limit: number): SearchResult {
    const db = this.open();
    const terms = tokenize(query);
    if (terms.length === 0) {
      return { total: 0, memories: [], resources: [] };
    }

    const rows = this.loadResources(db, "1 = 1");
    const files = rows.filter((row) => row.is_dir === 0);
    const best = new Map<string, ResourceHit>();
    const keep = (row: ResourceRow, score: number) => {
      const current = best.get(row.uri);
      if (!current || current.score < score) {
        best.set(row.uri, toResourceHit(row, score));
      }
    };

    for (const row of rows) {
      const score = scoreText(terms, `${row.uri} ${resourceText(row)}`, row.title);
      if (score === 0) continue;
      if (row.is_dir === 1) {
        for (const file of files) {
          if (file.uri.startsWith(row.uri)) keep(file, score);
        }
      } else {
        keep(row, score);
      }
    }

    return paginate(this.matchMemories(db, terms), sortHits([...best.values()]), limit);
  }

  ls(uri: string): DirEntry[] {
    const db = this.open();

    if (uri === ROOT_URI) {
      return [
        { name: "resources", uri: RESOURCES_URI, isDir: true, size: 0 },
        { name: "memories", uri: MEMORIES_URI, isDir: true, size: 0 },
      ];
    }
    assertKbUri(uri);

    const dirUri = uri.endsWith("/") ? uri : `${uri}/`;

    if (dirUri === MEMORIES_URI) {
      return db
        .prepare<[], MemoryRow>(`SELECT id, content, session_id FROM memories ORDER BY id`)
        .all()
        .map((row) => ({
          name: String(row.id),
          uri: `${MEMORIES_URI}${row.id}`,
          isDir: false,
          size: Buffer.byteLength(row.content),
        }));
    }

    if (dirUri !== RESOURCES_URI) {
      const self = this.getResource(db, dirUri) ?? this.getResource(db, uri);
      if (!self) {
        throw new KnowledgeBaseError("NOT_FOUND", `no such resource: ${uri}`);
      }
      if (self.is_dir === 0) {
        throw new KnowledgeBaseError("NOT_A_DIRECTORY", `not a directory: ${uri}`);
      }
    }

    return db
      .prepare<[string], ResourceRow>(
        `SELECT * FROM resources WHERE parent_uri = ? ORDER BY is_dir DESC, name ASC`
      )
      .all(dirUri)
      .map((row) => ({ name: row.name, uri: row.uri, isDir: row.is_dir === 1, size: row.size }));
  }

  read(uri: string): string {
    const db = this.open();
    assertKbUri(uri);

    const memory = this.getMemory(db, uri);
    if (memory) return memory.content;

    const row = this.getResource(db, uri);
    if (!row) {
      throw new KnowledgeBaseError("NOT_FOUND", `no such resource: ${uri}`);
    }
    if (row.is_dir === 1) {
      throw new KnowledgeBaseError("NOT_A_FILE", `is a directory: ${uri}`);
    }
    return row.content ?? "";
  }

  abstract(uri: string): string {
    const db = this.open();
    assertKbUri(uri);

    const memory = this.getMemory(db, uri);
    if (memory) return memory.content.slice(0, ABSTRACT_CHARS);

    if (uri === RESOURCES_URI) {
      return overview("resources", this.ls(RESOURCES_URI));
    }

    const row = this.getResource(db, uri);
    if (!row) {
      throw new KnowledgeBaseError("NOT_FOUND", `no such resource: ${uri}`);
    }
    if (row.is_dir === 1) {
      return overview(row.name, this.ls(row.uri));
    }
    return row.abstract || row.title;
  }

  listSessions(): SessionInfo[] {
    const db = this.open();
    return db
      .prepare<[], SessionRow>(
        `SELECT s.session_id, s.created_at, COUNT(m.id) AS memory_count
         FROM sessions s
         LEFT JOIN memories m ON m.session_id = s.session_id
         GROUP BY s.session_id
         ORDER BY s.created_at DESC, s.session_id DESC`
      )
      .all()
      .map((row) => ({
        sessionId: row.session_id,
        createdAt: row.created_at,
        memoryCount: row.memory_count,
      }));
  }

  // ============== Internals ==============

  /**
   * Database handle for one operation. Content deferred by a non-waiting
   * addResource() is indexed here, before the operation runs.
   */
  private open(): Database.Database {
    const db = this.db;
    if (!db) {
      throw new KnowledgeBaseError("NOT_INITIALIZED", "knowledge base is not initialized");
    }
    this.indexDeferred(db);
    return db;
  }

  private indexDeferred(db: Database.Database): void {
    const pending = db
      .prepare<[], ResourceRow>(`SELECT * FROM resources WHERE indexed = 0 AND is_dir = 0`)
      .all();
    if (pending.length === 0) return;

    const update = db.prepare<[string, string, string, string]>(
      `UPDATE resources SET title = ?, abstract = ?, content = ?, indexed = 1 WHERE uri = ?`
    );
    const remove = db.prepare<[string]>(`DELETE FROM resources WHERE uri = ?`);

    db.transaction(() => {
      for (const row of pending) {
        const doc = row.source_path && existsSync(row.source_path) ? readDocument(row.source_path) : null;
        if (!doc) {
          log.warn({ uri: row.uri }, "Dropping deferred resource that could not be indexed");
          remove.run(row.uri);
          continue;
        }
        update.run(doc.title || row.name, doc.abstract, doc.content, row.uri);
      }
    })();
    log.debug({ count: pending.length }, "Indexed deferred resources");
  }

  private loadResources(db: Database.Database, where: string): ResourceRow[] {
    return db
      .prepare<[], ResourceRow>(`SELECT * FROM resources WHERE ${where} AND indexed = 1`)
      .all();
  }

  private matchMemories(db: Database.Database, terms: string[]): MemoryHit[] {
    const rows = db
      .prepare<[], MemoryRow>(`SELECT id, content, session_id FROM memories`)
      .all();
    return sortHits(
      rows
        .map((row) => ({ row, score: scoreText(terms, row.content, "") }))
        .filter((hit) => hit.score > 0)
        .map(({ row, score }) => ({
          uri: `${MEMORIES_URI}${row.id}`,
          content: row.content,
          ...(row.session_id !== null && { sessionId: row.session_id }),
          score,
        }))
    );
  }

  private getResource(db: Database.Database, uri: string): ResourceRow | undefined {
    return db.prepare<[string], ResourceRow>(`SELECT * FROM resources WHERE uri = ?`).get(uri);
  }

  private getMemory(db: Database.Database, uri: string): MemoryRow | undefined {
    if (!uri.startsWith(MEMORIES_URI)) return undefined;
    const id = Number(uri.slice(MEMORIES_URI.length));
    if (!Number.isInteger(id)) {
      throw new KnowledgeBaseError("INVALID_URI", `invalid memory uri: ${uri}`);
    }
    const row = db
      .prepare<[number], MemoryRow>(`SELECT id, content, session_id FROM memories WHERE id = ?`)
      .get(id);
    if (!row) {
      throw new KnowledgeBaseError("NOT_FOUND", `no such memory: ${uri}`);
    }
    return row;
  }
}

// ============== Helpers ==============

function assertKbUri(uri: string): void {
  if (!uri.startsWith(ROOT_URI)) {
    throw new KnowledgeBaseError("INVALID_URI", `not a kb:// uri: ${uri}`);
  }
}

function collectTree(path: string, uri: string, parentUri: string, out: TreeEntry[]): void {
  const stat = statSync(path);
  const name = basename(path);

  if (stat.isDirectory()) {
    out.push({ uri, parentUri, name, isDir: true, sourcePath: path, size: 0 });
    const children = readdirSync(path, { withFileTypes: true })
      .filter((d) => !d.name.startsWith("."))
      .sort((a, b) => a.name.localeCompare(b.name));
    for (const child of children) {
      if (child.isDirectory()) {
        collectTree(join(path, child.name), `${uri}${child.name}/`, uri, out);
      } else if (child.isFile()) {
        collectTree(join(path, child.name), `${uri}${child.name}`, uri, out);
      }
    }
  } else if (stat.isFile()) {
    out.push({ uri, parentUri, name, isDir: false, sourcePath: path, size: stat.size });
  }
}

interface ParsedDocument {
  title: string;
  abstract: string;
  content: string;
}

/**
 * Read a text file. Returns null for binary content (any NUL byte).
 */
function readDocument(path: string): ParsedDocument | null {
  const raw = readFileSync(path);
  if (raw.includes(0)) return null;
  return parseDocument(raw.toString("utf-8"));
}

/**
 * Title = first Markdown heading; abstract = first prose paragraph, trimmed.
 */
export function parseDocument(content: string): ParsedDocument {
  const heading = /^#{1,6}\s+(.+)$/m.exec(content);
  const paragraph = content
    .split(/\n\s*\n/)
    .map((block) =>
      block
        .split("\n")
        .filter((line) => !/^\s*#/.test(line))
        .join(" ")
        .replace(/\s+/g, " ")
        .trim()
    )
    .find((block) => block.length > 0);

  return {
    title: heading ? heading[1].trim() : "",
    abstract: (paragraph ?? "").slice(0, ABSTRACT_CHARS),
    content,
  };
}

export function tokenize(query: string): string[] {
  return [...new Set(query.toLowerCase().split(/\s+/).filter(Boolean))];
}

/**
 * Distinct terms found in `text`, plus one for each term also in `title`.
 */
export function scoreText(terms: string[], text: string, title: string): number {
  const haystack = text.toLowerCase();
  const heading = title.toLowerCase();
  let score = 0;
  for (const term of terms) {
    if (haystack.includes(term)) score++;
    if (heading && heading.includes(term)) score++;
  }
  return score;
}

function resourceText(row: ResourceRow): string {
  return `${row.title} ${row.abstract} ${row.content ?? ""}`;
}

function toResourceHit(row: ResourceRow, score: number): ResourceHit {
  return {
    uri: row.uri,
    title: row.title,
    abstract: row.abstract,
    ...(row.content !== null && { content: row.content.slice(0, HIT_CONTENT_CHARS) }),
    score,
  };
}

function sortHits<T extends { uri: string; score: number }>(hits: T[]): T[] {
  return hits.sort((a, b) => b.score - a.score || a.uri.localeCompare(b.uri));
}

function paginate(memories: MemoryHit[], resources: ResourceHit[], limit: number): SearchResult {
  return {
    total: memories.length + resources.length,
    memories: memories.slice(0, limit),
    resources: resources.slice(0, limit),
  };
}

function overview(name: string, entries: DirEntry[]): string {
  const names = entries.slice(0, OVERVIEW_NAMES).map((e) => (e.isDir ? `${e.name}/` : e.name));
  const more = entries.length > OVERVIEW_NAMES ? ", ..." : "";
  return `${name}: ${entries.length} entries (${names.join(", ")}${more})`;
}
