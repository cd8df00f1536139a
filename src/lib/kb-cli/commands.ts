import minimist from "minimist";
import { resolve } from "node:path";
import { RESOURCES_URI } from "../knowledge/types.ts";
import { replyText, type ApiClient } from "./api_client.ts";

export const USAGE = `kb - knowledge base bridge

Usage:
  kb server [--port|-p <port>] [--host <host>] [--data-dir|-d <dir>] [--config|-c <file>]
  kb init                       Write a kbridge.config.json with defaults
  kb search <query...>          Search memories and resources
  kb find <query...>            Deep search, including directory names
  kb add <path>                 Ingest a file or directory
  kb ls [uri]                   List a directory (default ${RESOURCES_URI})
  kb read <uri>                 Print a file or memory
  kb abstract <uri>             Summarize a file or directory
  kb remember <text...>         Store a memory (--session <id>)
  kb sessions                   List recorded sessions
  kb status                     Show server and worker status
  kb help                       Show this help

Client commands talk to --api <url>, or api_base from the config.
Search commands take --limit <n> (default 10).`;

const DEFAULT_LIMIT = 10;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Run one client command against the API. Returns the process exit code.
 */
export async function runCommand(argv: string[], client: ApiClient, io: CliIO = consoleIO): Promise<number> {
  const parsed = minimist(argv, {
    string: ["api", "limit", "session"],
    alias: { l: "limit", s: "session" },
  });
  const [command, ...words] = parsed._.map(String);
  const rest = words.join(" ");

  const usage = (line: string) => {
    io.err(`Usage: kb ${line}`);
    return 1;
  };
  const print = (body: { result?: string; error?: string }) => {
    io.out(replyText(body));
    return body.result === undefined ? 1 : 0;
  };

  switch (command) {
    case undefined:
    case "help":
      io.out(USAGE);
      return 0;

    case "search":
    case "find": {
      if (!rest) return usage(`${command} <query>`);
      const limit = parsed.limit ? Number(parsed.limit) : DEFAULT_LIMIT;
      if (!Number.isInteger(limit) || limit < 1) {
        io.err(`Invalid --limit: ${parsed.limit}`);
        return 1;
      }
      return print(await client.post(`/api/kb/${command}`, { query: rest, limit }));
    }

    case "add":
      if (!rest) return usage("add <path>");
      return print(await client.post("/api/kb/add", { path: resolve(rest) }));

    case "ls":
      return print(await client.get("/api/kb/ls", { uri: rest || RESOURCES_URI }));

    case "read":
    case "abstract":
      if (!rest) return usage(`${command} <uri>`);
      return print(await client.get(`/api/kb/${command}`, { uri: rest }));

    case "remember": {
      if (!rest) return usage("remember <text> [--session <id>]");
      const session = parsed.session ? String(parsed.session) : undefined;
      return print(
        await client.post("/api/kb/memories", { content: rest, ...(session && { session_id: session }) })
      );
    }

    case "sessions":
      return print(await client.get("/api/kb/sessions"));

    case "status": {
      const body = await client.get("/api/kb/status");
      if (body.error !== undefined) {
        io.out(body.error);
        return 1;
      }
      io.out(JSON.stringify(body, null, 2));
      return 0;
    }

    default:
      io.err(`Unknown command: ${command}`);
      io.err(USAGE);
      return 1;
  }
}
