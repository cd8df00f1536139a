import minimist from "minimist";
import ora from "ora";
import { resolve } from "node:path";
import { clearArgsOverride, getConfig, setArgsOverride } from "../get_config.ts";
import { extractErrorMessage } from "../bridge/index.ts";
import { KnowledgeService } from "../knowledge/knowledge_service.ts";
import { ThreadedKnowledgeBase } from "../knowledge/threaded_backend.ts";
import { createComponentLogger } from "../observability/index.ts";
import { getDbPath } from "../paths.ts";
import { createApp, HealthMonitor, startHttpServer } from "../server/index.ts";

const log = createComponentLogger("server");

const SERVER_FLAGS = ["port", "host", "data-dir", "config"] as const;

export async function startServer(args: string[]): Promise<void> {
  const parsedArgs = minimist(args, {
    string: [...SERVER_FLAGS],
    alias: {
      p: "port",
      d: "data-dir",
      c: "config",
    },
  });

  // Override config with CLI args if provided
  const customArgs: string[] = [];
  for (const flag of SERVER_FLAGS) {
    if (parsedArgs[flag]) {
      customArgs.push(`--${flag}`, String(parsedArgs[flag]));
    }
  }
  if (customArgs.length > 0) {
    setArgsOverride(customArgs);
  }

  const spinner = ora({ text: "Starting kbridge", color: "cyan" }).start();
  let service: KnowledgeService | null = null;

  try {
    const config = await getConfig();
    const dbPath = getDbPath(resolve(config.data_dir));

    const kb = new KnowledgeService({
      createBackend: () => new ThreadedKnowledgeBase({ dbPath }),
      timeouts: config.timeouts,
      pollIntervalMs: config.poll_interval_ms,
    });
    service = kb;
    kb.start();

    spinner.text = "Opening knowledge base";
    if (!(await kb.whenReady(config.ready_timeout_ms))) {
      spinner.warn(`Knowledge base not ready (worker=${kb.workerState}); serving degraded responses`);
      spinner.start("Starting HTTP server");
    }

    const health = new HealthMonitor();
    health.start();
    const server = await startHttpServer(createApp(kb, { healthMonitor: health }), {
      host: config.host,
      port: config.port,
    });
    spinner.succeed(`kbridge listening on http://${config.host}:${server.port} (db: ${dbPath})`);

    let stopping = false;
    const shutdown = async (signal: string) => {
      if (stopping) return;
      stopping = true;
      log.info({ signal }, "Shutting down");
      health.stop();
      await server.close();
      await kb.close();
    };
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            log.error({ error: extractErrorMessage(error) }, "Shutdown failed");
            process.exit(1);
          });
      });
    }
  } catch (error) {
    spinner.fail(`Failed to start server: ${extractErrorMessage(error)}`);
    await service?.close();
    process.exitCode = 1;
  } finally {
    // Clear args override
    clearArgsOverride();
  }
}
