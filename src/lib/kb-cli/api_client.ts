// HTTP client the CLI and MCP bridge use to reach a running kbridge server.
// Failures never throw: they come back as { error } like any other reply.

import { z } from "zod";
import { extractErrorMessage } from "../bridge/index.ts";

export const GET_TIMEOUT_MS = 30000;
export const POST_TIMEOUT_MS = 120000;

const ApiBodySchema = z
  .object({
    result: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type ApiBody = z.infer<typeof ApiBodySchema>;

export interface ApiClient {
  readonly baseUrl: string;
  get(path: string, query?: Record<string, string>): Promise<ApiBody>;
  post(path: string, body: unknown): Promise<ApiBody>;
}

export function createApiClient(baseUrl: string, fetchImpl: typeof fetch = fetch): ApiClient {
  const base = baseUrl.replace(/\/+$/, "");

  async function send(url: string, init: RequestInit, timeoutMs: number): Promise<ApiBody> {
    let response: Response;
    try {
      response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      return { error: `API unavailable: ${extractErrorMessage(error)}` };
    }

    try {
      const parsed = ApiBodySchema.safeParse(await response.json());
      if (!parsed.success) {
        return { error: `Unexpected response (HTTP ${response.status})` };
      }
      return parsed.data;
    } catch (error) {
      return { error: extractErrorMessage(error) };
    }
  }

  return {
    baseUrl: base,
    get(path, query) {
      const qs = query ? `?${new URLSearchParams(query).toString()}` : "";
      return send(`${base}${path}${qs}`, { method: "GET" }, GET_TIMEOUT_MS);
    },
    post(path, body) {
      return send(
        `${base}${path}`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(body),
        },
        POST_TIMEOUT_MS
      );
    },
  };
}

/**
 * Text to show for a reply: its result, else its error
 */
export function replyText(body: ApiBody): string {
  return body.result ?? body.error ?? "Unknown error";
}
