#!/usr/bin/env tsx

import minimist from "minimist";
import { extractErrorMessage } from "./lib/bridge/index.ts";
import { getConfig } from "./lib/get_config.ts";
import { createApiClient } from "./lib/kb-cli/api_client.ts";
import { runCommand } from "./lib/kb-cli/commands.ts";
import { init } from "./lib/kb-cli/init.ts";
import { startServer } from "./lib/kb-cli/server.ts";

async function main(args: string[]): Promise<void> {
  const [command, ...rest] = args;

  if (command === "server") {
    await startServer(rest);
    return;
  }
  if (command === "init") {
    process.exitCode = await init();
    return;
  }

  const { api } = minimist(args, { string: ["api"] });
  const baseUrl = api || (await getConfig()).api_base;
  process.exitCode = await runCommand(args, createApiClient(baseUrl));
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(extractErrorMessage(error));
  process.exit(1);
});
