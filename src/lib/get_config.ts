import minimist from "minimist";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_TIMEOUTS, type OperationTimeouts } from "./knowledge/knowledge_service.ts";
import { CONFIG_FILE_NAME, getDefaultDataDir } from "./paths.ts";

const positiveMs = z.coerce.number().int().positive();

const TimeoutsSchema = z
  .object({
    search: positiveMs,
    find: positiveMs,
    add_resource: positiveMs,
    ls: positiveMs,
    read: positiveMs,
    abstract: positiveMs,
    list_sessions: positiveMs,
    retrieve_context: positiveMs,
    add_memory: positiveMs,
  })
  .strict();

const ConfigLayerSchema = z
  .object({
    port: z.coerce.number().int().min(1).max(65535),
    host: z.string().min(1),
    data_dir: z.string().min(1),
    api_base: z.string().url(),
    poll_interval_ms: positiveMs,
    ready_timeout_ms: positiveMs,
    timeouts: TimeoutsSchema.partial(),
  })
  .partial()
  .strict();

type ConfigLayer = z.infer<typeof ConfigLayerSchema>;

export interface Config {
  port: number;
  host: string;
  data_dir: string;
  api_base: string;
  poll_interval_ms: number;
  ready_timeout_ms: number;
  timeouts: OperationTimeouts;
  /** Config file that was read, if any */
  config_file?: string;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const DEFAULT_PORT = 18790;
const DEFAULT_HOST = "127.0.0.1";

// CLI args set by `kb server`, highest precedence
let argsOverride: string[] | null = null;

export function setArgsOverride(args: string[]): void {
  argsOverride = args;
}

export function clearArgsOverride(): void {
  argsOverride = null;
}

export interface GetConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration: defaults < config file < environment < CLI args.
 */
export async function getConfig(options: GetConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const args = minimist(argsOverride ?? [], {
    string: ["port", "host", "data-dir", "api", "config"],
  });

  const configFile = args.config || env.KBRIDGE_CONFIG_FILE || join(cwd, CONFIG_FILE_NAME);
  const fileLayer = await readConfigFile(configFile);

  const envLayer = parseLayer(
    {
      ...(env.KBRIDGE_PORT && { port: env.KBRIDGE_PORT }),
      ...(env.KBRIDGE_HOST && { host: env.KBRIDGE_HOST }),
      ...(env.KBRIDGE_DATA_DIR && { data_dir: env.KBRIDGE_DATA_DIR }),
      ...(env.KBRIDGE_API && { api_base: env.KBRIDGE_API }),
    },
    "environment"
  );

  const argsLayer = parseLayer(
    {
      ...(args.port && { port: args.port }),
      ...(args.host && { host: args.host }),
      ...(args["data-dir"] && { data_dir: args["data-dir"] }),
      ...(args.api && { api_base: args.api }),
    },
    "command line"
  );

  const merged: ConfigLayer = { ...fileLayer, ...envLayer, ...argsLayer };
  const port = merged.port ?? DEFAULT_PORT;
  const host = merged.host ?? DEFAULT_HOST;

  return {
    port,
    host,
    data_dir: merged.data_dir ?? getDefaultDataDir(env),
    api_base: merged.api_base ?? `http://${host}:${port}`,
    poll_interval_ms: merged.poll_interval_ms ?? 60000,
    ready_timeout_ms: merged.ready_timeout_ms ?? 10000,
    timeouts: { ...DEFAULT_TIMEOUTS, ...fileLayer?.timeouts },
    ...(fileLayer && { config_file: configFile }),
  };
}

async function readConfigFile(path: string): Promise<ConfigLayer | null> {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file ${path}`, { cause: error });
  }
  return parseLayer(raw, path);
}

function parseLayer(raw: unknown, source: string): ConfigLayer {
  const result = ConfigLayerSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration from ${source}: ${issues}`);
  }
  return result.data;
}
