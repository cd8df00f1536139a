import { describe, test, expect } from "vitest";
import { callTool, TOOLS } from "./tools.ts";
import { createApiClient } from "../kb-cli/api_client.ts";
import { createFailingFetch, createFetchStub } from "../test-utils.ts";

function stubbedClient(payload: unknown, status = 200) {
  const stub = createFetchStub(payload, status);
  return { client: createApiClient("http://kb.test", stub.fetch), requests: stub.requests };
}

describe("MCP tools", () => {
  test("exposes every knowledge base tool", () => {
    expect(TOOLS.map((t) => t.name)).toEqual([
      "kb_search",
      "kb_find",
      "kb_add",
      "kb_ls",
      "kb_read",
      "kb_abstract",
      "kb_sessions",
      "kb_remember",
    ]);
  });

  test("kb_search forwards the query with its default limit", async () => {
    const { client, requests } = stubbedClient({ result: "Found 1 results for 'tea':" });

    const result = await callTool(client, "kb_search", { query: "tea" });

    expect(result).toEqual({ content: [{ type: "text", text: "Found 1 results for 'tea':" }] });
    expect(requests).toEqual([
      { url: "http://kb.test/api/kb/search", method: "POST", body: { query: "tea", limit: 5 } },
    ]);
  });

  test("kb_ls defaults to the resources root", async () => {
    const { client, requests } = stubbedClient({ result: "Directory kb://resources/ is empty" });

    await callTool(client, "kb_ls", undefined);

    expect(requests[0].url).toBe("http://kb.test/api/kb/ls?uri=kb%3A%2F%2Fresources%2F");
  });

  test("kb_remember sends the session", async () => {
    const { client, requests } = stubbedClient({ result: "Memory stored: kb://memories/1 (session=s1)" });

    await callTool(client, "kb_remember", { content: "likes tea", session_id: "s1" });

    expect(requests[0].body).toEqual({ content: "likes tea", session_id: "s1" });
  });

  test("invalid arguments are reported without calling the API", async () => {
    const { client, requests } = stubbedClient({ result: "unused" });

    const result = await callTool(client, "kb_read", {});

    expect(result).toEqual({
      content: [{ type: "text", text: "Error: Invalid arguments for kb_read: uri: Required" }],
      isError: true,
    });
    expect(requests).toHaveLength(0);
  });

  test("API errors and unknown tools are flagged", async () => {
    const { client } = stubbedClient({ error: "Knowledge base not initialized" }, 503);

    expect(await callTool(client, "kb_sessions", {})).toEqual({
      content: [{ type: "text", text: "Knowledge base not initialized" }],
      isError: true,
    });
    expect(await callTool(client, "kb_delete", {})).toEqual({
      content: [{ type: "text", text: 'Error: Unknown tool "kb_delete"' }],
      isError: true,
    });
  });

  test("an unreachable server is an error result", async () => {
    const client = createApiClient("http://127.0.0.1:18790", createFailingFetch("fetch failed"));

    expect(await callTool(client, "kb_find", { query: "tea" })).toEqual({
      content: [{ type: "text", text: "API unavailable: fetch failed" }],
      isError: true,
    });
  });
});
