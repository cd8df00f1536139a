/**
 * Tests for SqliteKnowledgeBase against an in-memory database and temp dirs
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { SqliteKnowledgeBase, parseDocument, scoreText, tokenize } from "./sqlite_backend.ts";
import { KnowledgeBaseError } from "./types.ts";
import { createTempDir } from "../test-utils.ts";

const WAIT = { wait: true, timeoutMs: 120000 };

function tickingClock(step = 1): () => number {
  let now = 1000;
  return () => {
    const current = now;
    now += step;
    return current;
  };
}

function expectKbError(fn: () => unknown, code: string): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(KnowledgeBaseError);
    if (error instanceof KnowledgeBaseError) {
      expect(error.code).toBe(code);
    }
    return;
  }
  throw new Error(`expected KnowledgeBaseError ${code}`);
}

let tempDir: string;
let docsDir: string;
let kb: SqliteKnowledgeBase;

beforeEach(() => {
  tempDir = createTempDir();
  docsDir = join(tempDir, "docs");
  mkdirSync(join(docsDir, "sub"), { recursive: true });
  writeFileSync(
    join(docsDir, "guide.md"),
    "# Setup Guide\n\nInstall the widget with care.\n\nMore details here."
  );
  writeFileSync(join(docsDir, "notes.txt"), "coffee brewing ratios");
  writeFileSync(join(docsDir, ".hidden.md"), "secret");
  writeFileSync(join(docsDir, "sub", "deep.md"), "# Deep\n\nnested widget notes");
  writeFileSync(join(docsDir, "blob.bin"), Buffer.from([0x00, 0x01, 0x02]));

  kb = new SqliteKnowledgeBase({ dbPath: ":memory:", clock: tickingClock() });
  kb.initialize();
});

afterEach(() => {
  kb.close();
  rmSync(tempDir, { recursive: true, force: true });
});

describe("lifecycle", () => {
  test("rejects calls before initialize", () => {
    const fresh = new SqliteKnowledgeBase({ dbPath: ":memory:" });
    expectKbError(() => fresh.search("x", 5), "NOT_INITIALIZED");
  });

  test("close is idempotent and disables further calls", () => {
    kb.close();
    kb.close();
    expectKbError(() => kb.listSessions(), "NOT_INITIALIZED");
  });

  test("creates the database file and its directory", () => {
    const dbPath = join(tempDir, "nested", "kb.db");
    const fileKb = new SqliteKnowledgeBase({ dbPath });
    fileKb.initialize();
    fileKb.addMemory("persisted");
    fileKb.close();

    const reopened = new SqliteKnowledgeBase({ dbPath });
    reopened.initialize();
    expect(reopened.read("kb://memories/1")).toBe("persisted");
    reopened.close();
  });
});

describe("addResource", () => {
  test("ingests a directory tree, skipping hidden and binary files", () => {
    const result = kb.addResource(docsDir, WAIT);

    expect(result).toEqual({
      status: "partial",
      errors: [`skipped binary file: ${join(docsDir, "blob.bin")}`],
      rootUri: "kb://resources/docs/",
    });
    expect(kb.ls("kb://resources/docs/").map((e) => e.name)).toEqual([
      "sub",
      "guide.md",
      "notes.txt",
    ]);
  });

  test("ingests a single file", () => {
    const result = kb.addResource(join(docsDir, "notes.txt"), WAIT);
    expect(result).toEqual({ status: "success", errors: [], rootUri: "kb://resources/notes.txt" });
    expect(kb.read("kb://resources/notes.txt")).toBe("coffee brewing ratios");
  });

  test("reports a missing path as failed", () => {
    const missing = join(tempDir, "nope.md");
    expect(kb.addResource(missing, WAIT)).toEqual({
      status: "failed",
      errors: [`path does not exist: ${missing}`],
      rootUri: "",
    });
  });

  test("replaces rows when the same path is added again", () => {
    const file = join(tempDir, "note.md");
    writeFileSync(file, "first");
    kb.addResource(file, WAIT);
    writeFileSync(file, "second");
    kb.addResource(file, WAIT);

    expect(kb.read("kb://resources/note.md")).toBe("second");
    expect(kb.ls("kb://resources/")).toHaveLength(1);
  });

  test("re-adding a directory leaves lookalike siblings alone", () => {
    for (const name of ["aXb", "a_b", "Docs2", "docs2"]) {
      mkdirSync(join(tempDir, name));
      writeFileSync(join(tempDir, name, "file.md"), `inside ${name}`);
    }
    for (const name of ["aXb", "a_b", "a_b", "docs2", "Docs2", "Docs2"]) {
      kb.addResource(join(tempDir, name), WAIT);
    }

    expect(kb.ls("kb://resources/").map((e) => e.name)).toEqual(["Docs2", "aXb", "a_b", "docs2"]);
    expect(kb.read("kb://resources/aXb/file.md")).toBe("inside aXb");
    expect(kb.read("kb://resources/docs2/file.md")).toBe("inside docs2");
  });

  test("defers indexing to the next call when not waiting", () => {
    const file = join(docsDir, "guide.md");
    const result = kb.addResource(file, { wait: false, timeoutMs: 1000 });

    expect(result).toEqual({ status: "accepted", errors: [], rootUri: "kb://resources/guide.md" });
    expect(kb.abstract("kb://resources/guide.md")).toBe("Install the widget with care.");
  });

  test("stops at the ingestion budget", () => {
    const dir = join(tempDir, "many");
    mkdirSync(dir);
    for (const name of ["a.md", "b.md", "c.md"]) {
      writeFileSync(join(dir, name), `content of ${name}`);
    }
    const slow = new SqliteKnowledgeBase({ dbPath: ":memory:", clock: tickingClock(50) });
    slow.initialize();

    const result = slow.addResource(dir, { wait: true, timeoutMs: 60 });

    expect(result).toEqual({
      status: "partial",
      errors: ["INGEST_TIMEOUT: ingestion exceeded 60ms"],
      rootUri: "kb://resources/many/",
    });
    expect(slow.ls("kb://resources/many/").map((e) => e.name)).toEqual(["a.md"]);
    slow.close();
  });
});

describe("navigation", () => {
  beforeEach(() => {
    kb.addResource(docsDir, WAIT);
  });

  test("ls of the root lists both namespaces", () => {
    expect(kb.ls("kb://")).toEqual([
      { name: "resources", uri: "kb://resources/", isDir: true, size: 0 },
      { name: "memories", uri: "kb://memories/", isDir: true, size: 0 },
    ]);
  });

  test("ls accepts a directory uri without a trailing slash", () => {
    expect(kb.ls("kb://resources")).toEqual([
      { name: "docs", uri: "kb://resources/docs/", isDir: true, size: 0 },
    ]);
    expect(kb.ls("kb://resources/docs/sub")).toEqual([
      { name: "deep.md", uri: "kb://resources/docs/sub/deep.md", isDir: false, size: 27 },
    ]);
  });

  test("ls rejects files, unknown paths and foreign uris", () => {
    expectKbError(() => kb.ls("kb://resources/docs/guide.md"), "NOT_A_DIRECTORY");
    expectKbError(() => kb.ls("kb://resources/missing/"), "NOT_FOUND");
    expectKbError(() => kb.ls("http://example.com/"), "INVALID_URI");
  });

  test("read returns file content and rejects directories", () => {
    expect(kb.read("kb://resources/docs/sub/deep.md")).toBe("# Deep\n\nnested widget notes");
    expectKbError(() => kb.read("kb://resources/docs/"), "NOT_A_FILE");
    expectKbError(() => kb.read("kb://resources/docs/none.md"), "NOT_FOUND");
  });

  test("abstract of a file and a directory overview", () => {
    expect(kb.abstract("kb://resources/docs/guide.md")).toBe("Install the widget with care.");
    expect(kb.abstract("kb://resources/docs/")).toBe("docs: 3 entries (sub/, guide.md, notes.txt)");
    expect(kb.abstract("kb://resources/")).toBe("resources: 1 entries (docs/)");
  });
});

describe("search and find", () => {
  beforeEach(() => {
    kb.addResource(docsDir, WAIT);
  });

  test("search ranks by matched terms, then uri", () => {
    const result = kb.search("widget", 5);
    expect(result.total).toBe(2);
    expect(result.resources.map((r) => [r.uri, r.score])).toEqual([
      ["kb://resources/docs/guide.md", 1],
      ["kb://resources/docs/sub/deep.md", 1],
    ]);
  });

  test("title hits score extra", () => {
    const result = kb.search("setup widget", 5);
    expect(result.resources[0]).toMatchObject({
      uri: "kb://resources/docs/guide.md",
      title: "Setup Guide",
      score: 3,
    });
  });

  test("limit applies after counting", () => {
    const result = kb.search("widget", 1);
    expect(result.total).toBe(2);
    expect(result.resources).toHaveLength(1);
  });

  test("blank queries match nothing", () => {
    expect(kb.search("   ", 5)).toEqual({ total: 0, memories: [], resources: [] });
  });

  test("find expands a matching directory to its files", () => {
    const result = kb.find("sub", 10);
    expect(result.total).toBe(1);
    expect(result.resources.map((r) => [r.uri, r.score])).toEqual([
      ["kb://resources/docs/sub/deep.md", 2],
    ]);
  });
});

describe("memories and sessions", () => {
  test("stores memories with and without a session", () => {
    expect(kb.addMemory("likes green tea", "s1")).toEqual({
      uri: "kb://memories/1",
      sessionId: "s1",
    });
    expect(kb.addMemory("no session here")).toEqual({ uri: "kb://memories/2" });
    expect(kb.read("kb://memories/1")).toBe("likes green tea");
    expect(kb.ls("kb://memories/").map((e) => e.name)).toEqual(["1", "2"]);
  });

  test("memories are searchable", () => {
    kb.addMemory("likes green tea", "s1");
    expect(kb.search("tea", 5)).toEqual({
      total: 1,
      memories: [{ uri: "kb://memories/1", content: "likes green tea", sessionId: "s1", score: 1 }],
      resources: [],
    });
  });

  test("rejects malformed and unknown memory uris", () => {
    expectKbError(() => kb.read("kb://memories/abc"), "INVALID_URI");
    expectKbError(() => kb.read("kb://memories/99"), "NOT_FOUND");
  });

  test("lists sessions newest first with memory counts", () => {
    kb.addMemory("one", "s1");
    kb.addMemory("two", "s2");
    kb.addMemory("three", "s1");

    expect(kb.listSessions().map((s) => [s.sessionId, s.memoryCount])).toEqual([
      ["s2", 1],
      ["s1", 2],
    ]);
  });
});

describe("text helpers", () => {
  test("parseDocument takes the first heading and prose paragraph", () => {
    expect(parseDocument("intro line\n# Title\n\nbody")).toEqual({
      title: "Title",
      abstract: "intro line",
      content: "intro line\n# Title\n\nbody",
    });
  });

  test("tokenize lowercases and dedupes", () => {
    expect(tokenize(" Tea  tea COFFEE ")).toEqual(["tea", "coffee"]);
  });

  test("scoreText counts distinct terms plus title hits", () => {
    expect(scoreText(["tea", "milk"], "Green tea", "Tea time")).toBe(2);
  });
});
