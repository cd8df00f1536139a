// Worker-thread entry that owns the SQLite connection for ThreadedKnowledgeBase.

import { threadData } from "../bridge/index.ts";
import { SqliteKnowledgeBase } from "./sqlite_backend.ts";
import { KnowledgeThreadDataSchema, serveKnowledgeBase } from "./threaded_backend.ts";

const { dbPath } = KnowledgeThreadDataSchema.parse(threadData());

serveKnowledgeBase(new SqliteKnowledgeBase({ dbPath }));
