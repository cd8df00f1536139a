// Thread entry for knowledge service tests: SQLite, except that a search for
// "stall:<ms>" holds the thread for that long before answering.

import { threadData } from "../bridge/index.ts";
import { SqliteKnowledgeBase } from "../knowledge/sqlite_backend.ts";
import { KnowledgeThreadDataSchema, serveKnowledgeBase } from "../knowledge/threaded_backend.ts";
import type { SearchResult } from "../knowledge/types.ts";
import { blockFor } from "../test-utils.ts";

class StallingKnowledgeBase extends SqliteKnowledgeBase {
  search(query: string, limit: number): SearchResult {
    const stall = /^stall:(\d+)$/.exec(query);
    if (stall) {
      blockFor(Number(stall[1]));
    }
    return super.search(query, limit);
  }
}

const { dbPath } = KnowledgeThreadDataSchema.parse(threadData());

serveKnowledgeBase(new StallingKnowledgeBase({ dbPath }));
