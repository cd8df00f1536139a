/**
 * Knowledge base REST routes, mounted under /api/kb.
 *
 * Every route except /status answers 503 while the knowledge base is not
 * ready; otherwise the service's text result is wrapped in JSON.
 */

import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import { augmentWithContext } from "../knowledge/augment.ts";
import { NOT_INITIALIZED_MESSAGE, type KnowledgeService } from "../knowledge/knowledge_service.ts";
import { RESOURCES_URI } from "../knowledge/types.ts";

// ============== Schemas ==============

const ErrorSchema = z.object({ error: z.string() }).openapi("Error");
const ResultSchema = z.object({ result: z.string() }).openapi("Result");

const StatusSchema = z
  .union([
    z.object({
      status: z.literal("ok"),
      ready: z.literal(true),
      worker: z.string(),
      queue_depth: z.number().int(),
    }),
    z.object({ status: z.literal("disabled"), message: z.string() }),
  ])
  .openapi("Status");

const limitField = (fallback: number) => z.number().int().min(1).max(100).default(fallback);

const SearchBodySchema = z
  .object({
    query: z.string().min(1).openapi({ example: "deployment checklist" }),
    limit: limitField(5),
  })
  .openapi("SearchRequest");

const AddBodySchema = z
  .object({ path: z.string().min(1).openapi({ example: "./docs" }) })
  .openapi("AddResourceRequest");

const ContextBodySchema = z
  .object({ query: z.string().min(1), limit: limitField(3) })
  .openapi("ContextRequest");

const AugmentBodySchema = z
  .object({ message: z.string().min(1), limit: limitField(3) })
  .openapi("AugmentRequest");

const MemoryBodySchema = z
  .object({ content: z.string().min(1), session_id: z.string().min(1).optional() })
  .openapi("MemoryRequest");

const UriQuerySchema = z.object({
  uri: z.string().min(1).openapi({ param: { name: "uri", in: "query" }, example: "kb://resources/" }),
});

const LsQuerySchema = z.object({
  uri: z
    .string()
    .min(1)
    .default(RESOURCES_URI)
    .openapi({ param: { name: "uri", in: "query" }, example: RESOURCES_URI }),
});

// ============== Route helpers ==============

function jsonBody<T extends z.ZodTypeAny>(schema: T) {
  return { body: { content: { "application/json": { schema } }, required: true } };
}

function ok<T extends z.ZodTypeAny>(schema: T, description: string) {
  return {
    200: { content: { "application/json": { schema } }, description },
    503: {
      content: { "application/json": { schema: ErrorSchema } },
      description: NOT_INITIALIZED_MESSAGE,
    },
  };
}

const NOT_READY = { error: NOT_INITIALIZED_MESSAGE };

// ============== Routes ==============

const statusRoute = createRoute({
  method: "get",
  path: "/status",
  responses: {
    200: { content: { "application/json": { schema: StatusSchema } }, description: "Bridge status" },
  },
});

const searchRoute = createRoute({
  method: "post",
  path: "/search",
  request: jsonBody(SearchBodySchema),
  responses: ok(ResultSchema, "Semantic search over memories and resources"),
});

const findRoute = createRoute({
  method: "post",
  path: "/find",
  request: jsonBody(SearchBodySchema),
  responses: ok(ResultSchema, "Deep search, including directory names"),
});

const addRoute = createRoute({
  method: "post",
  path: "/add",
  request: jsonBody(AddBodySchema),
  responses: ok(ResultSchema, "Ingest a file or directory"),
});

const lsRoute = createRoute({
  method: "get",
  path: "/ls",
  request: { query: LsQuerySchema },
  responses: ok(ResultSchema, "List a directory"),
});

const readRoute = createRoute({
  method: "get",
  path: "/read",
  request: { query: UriQuerySchema },
  responses: ok(ResultSchema, "Read a file or memory"),
});

const abstractRoute = createRoute({
  method: "get",
  path: "/abstract",
  request: { query: UriQuerySchema },
  responses: ok(ResultSchema, "Summary of a file or directory"),
});

const sessionsRoute = createRoute({
  method: "get",
  path: "/sessions",
  responses: ok(ResultSchema, "Recorded sessions"),
});

const contextRoute = createRoute({
  method: "post",
  path: "/context",
  request: jsonBody(ContextBodySchema),
  responses: ok(z.object({ context: z.string() }).openapi("Context"), "Context block for a prompt"),
});

const augmentRoute = createRoute({
  method: "post",
  path: "/augment",
  request: jsonBody(AugmentBodySchema),
  responses: ok(z.object({ message: z.string() }).openapi("Augmented"), "Message with context prepended"),
});

const memoriesRoute = createRoute({
  method: "post",
  path: "/memories",
  request: jsonBody(MemoryBodySchema),
  responses: ok(ResultSchema, "Store a memory"),
});

export function createKbRoutes(service: KnowledgeService): OpenAPIHono {
  const api = new OpenAPIHono({
    // 400 { error } instead of zod's default payload
    defaultHook: (result, c) => {
      if (!result.success) {
        const message = result.error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; ");
        return c.json({ error: message }, 400);
      }
    },
  });

  api.openapi(statusRoute, (c) => {
    if (!service.ready) {
      return c.json({ status: "disabled" as const, message: NOT_INITIALIZED_MESSAGE }, 200);
    }
    return c.json(
      {
        status: "ok" as const,
        ready: true as const,
        worker: service.workerState,
        queue_depth: service.queueDepth,
      },
      200
    );
  });

  api.openapi(searchRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { query, limit } = c.req.valid("json");
    return c.json({ result: await service.search(query, limit) }, 200);
  });

  api.openapi(findRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { query, limit } = c.req.valid("json");
    return c.json({ result: await service.find(query, limit) }, 200);
  });

  api.openapi(addRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { path } = c.req.valid("json");
    return c.json({ result: await service.addResource(path) }, 200);
  });

  api.openapi(lsRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { uri } = c.req.valid("query");
    return c.json({ result: await service.ls(uri) }, 200);
  });

  api.openapi(readRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { uri } = c.req.valid("query");
    return c.json({ result: await service.read(uri) }, 200);
  });

  api.openapi(abstractRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { uri } = c.req.valid("query");
    return c.json({ result: await service.abstract(uri) }, 200);
  });

  api.openapi(sessionsRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    return c.json({ result: await service.listSessions() }, 200);
  });

  api.openapi(contextRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { query, limit } = c.req.valid("json");
    return c.json({ context: await service.retrieveContext(query, limit) }, 200);
  });

  api.openapi(augmentRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { message, limit } = c.req.valid("json");
    return c.json({ message: await augmentWithContext(service, message, limit) }, 200);
  });

  api.openapi(memoriesRoute, async (c) => {
    if (!service.ready) return c.json(NOT_READY, 503);
    const { content, session_id } = c.req.valid("json");
    return c.json({ result: await service.addMemory(content, session_id) }, 200);
  });

  return api;
}
