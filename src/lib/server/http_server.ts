import { serve, type ServerType } from "@hono/node-server";
import type { OpenAPIHono } from "@hono/zod-openapi";
import { createComponentLogger } from "../observability/index.ts";

const log = createComponentLogger("http-server");

export interface HttpServerOptions {
  host: string;
  port: number;
}

export interface RunningHttpServer {
  port: number;
  close(): Promise<void>;
}

/**
 * Serve `app` with @hono/node-server. Resolves once the socket is listening.
 */
export function startHttpServer(
  app: OpenAPIHono,
  options: HttpServerOptions
): Promise<RunningHttpServer> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);

    const server: ServerType = serve({ fetch: app.fetch, hostname: options.host, port: options.port }, (info) => {
      log.info({ host: options.host, port: info.port }, "HTTP server listening");
      server.off("error", onError);
      resolve({ port: info.port, close: () => closeServer(server) });
    });
    server.once("error", onError);
  });
}

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      log.info("HTTP server closed");
      resolve();
    });
  });
}
