/**
 * MCP tools for the knowledge base.
 *
 * Each tool validates its arguments with zod and forwards to the HTTP API,
 * so an agent gets exactly the text a CLI user would see.
 */

import { z } from "zod";
import { RESOURCES_URI } from "../knowledge/types.ts";
import type { ApiBody, ApiClient } from "../kb-cli/api_client.ts";

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

interface JsonObjectSchema {
  type: "object";
  properties: Record<string, { type: string; description?: string }>;
  required?: string[];
}

export interface KbTool {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
  run(client: ApiClient, args: unknown): Promise<ToolResult>;
}

function text(value: string, isError = false): ToolResult {
  return { content: [{ type: "text", text: value }], ...(isError && { isError }) };
}

function defineTool<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  schema: S;
  inputSchema: JsonObjectSchema;
  invoke: (client: ApiClient, args: z.infer<S>) => Promise<ApiBody>;
}): KbTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async run(client, args) {
      const parsed = definition.schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
          .join("; ");
        return text(`Error: Invalid arguments for ${definition.name}: ${issues}`, true);
      }
      const body = await definition.invoke(client, parsed.data);
      if (body.result !== undefined) {
        return text(body.result);
      }
      return text(body.error ?? "Unknown error", true);
    },
  };
}

const query = { type: "string", description: "What to look for" };
const limit = { type: "number", description: "Maximum results per kind" };
const uri = { type: "string", description: `Knowledge base URI, e.g. ${RESOURCES_URI}` };

export const TOOLS: KbTool[] = [
  defineTool({
    name: "kb_search",
    description: "Search memories and ingested resources in the knowledge base",
    schema: z.object({ query: z.string().min(1), limit: z.number().int().positive().default(5) }),
    inputSchema: { type: "object", properties: { query, limit }, required: ["query"] },
    invoke: (client, args) => client.post("/api/kb/search", args),
  }),
  defineTool({
    name: "kb_find",
    description: "Deep search that also matches resource paths and directory names",
    schema: z.object({ query: z.string().min(1), limit: z.number().int().positive().default(10) }),
    inputSchema: { type: "object", properties: { query, limit }, required: ["query"] },
    invoke: (client, args) => client.post("/api/kb/find", args),
  }),
  defineTool({
    name: "kb_add",
    description: "Ingest a file or directory from the server's filesystem",
    schema: z.object({ path: z.string().min(1) }),
    inputSchema: {
      type: "object",
      properties: { path: { type: "string", description: "Absolute path on the server" } },
      required: ["path"],
    },
    invoke: (client, args) => client.post("/api/kb/add", args),
  }),
  defineTool({
    name: "kb_ls",
    description: "List a knowledge base directory",
    schema: z.object({ uri: z.string().min(1).default(RESOURCES_URI) }),
    inputSchema: { type: "object", properties: { uri } },
    invoke: (client, args) => client.get("/api/kb/ls", { uri: args.uri }),
  }),
  defineTool({
    name: "kb_read",
    description: "Read a resource file or a memory",
    schema: z.object({ uri: z.string().min(1) }),
    inputSchema: { type: "object", properties: { uri }, required: ["uri"] },
    invoke: (client, args) => client.get("/api/kb/read", { uri: args.uri }),
  }),
  defineTool({
    name: "kb_abstract",
    description: "Short summary of a resource file or directory",
    schema: z.object({ uri: z.string().min(1) }),
    inputSchema: { type: "object", properties: { uri }, required: ["uri"] },
    invoke: (client, args) => client.get("/api/kb/abstract", { uri: args.uri }),
  }),
  defineTool({
    name: "kb_sessions",
    description: "List recorded sessions",
    schema: z.object({}),
    inputSchema: { type: "object", properties: {} },
    invoke: (client) => client.get("/api/kb/sessions"),
  }),
  defineTool({
    name: "kb_remember",
    description: "Store a memory, optionally tied to a session",
    schema: z.object({ content: z.string().min(1), session_id: z.string().min(1).optional() }),
    inputSchema: {
      type: "object",
      properties: {
        content: { type: "string", description: "Text to remember" },
        session_id: { type: "string", description: "Session to file it under" },
      },
      required: ["content"],
    },
    invoke: (client, args) => client.post("/api/kb/memories", args),
  }),
];

export async function callTool(client: ApiClient, name: string, args: unknown): Promise<ToolResult> {
  const tool = TOOLS.find((t) => t.name === name);
  if (!tool) {
    return text(`Error: Unknown tool "${name}"`, true);
  }
  return tool.run(client, args ?? {});
}
