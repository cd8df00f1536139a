import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_FILE_NAME } from "../paths.ts";
import { consoleIO, type CliIO } from "./commands.ts";

export async function init(cwd: string = process.cwd(), io: CliIO = consoleIO): Promise<number> {
  const configFile = join(cwd, CONFIG_FILE_NAME);

  if (existsSync(configFile)) {
    io.err(`Error: ${CONFIG_FILE_NAME} already exists.`);
    io.err("Remove it or run init in a different directory.");
    return 1;
  }

  const defaultConfig = {
    port: 18790,
    host: "127.0.0.1",
    data_dir: "./.kbridge",
  };

  await writeFile(configFile, JSON.stringify(defaultConfig, null, 2) + "\n");

  io.out(`✓ Created ${CONFIG_FILE_NAME}`);
  io.out("\nReady! Start server: kb server");
  return 0;
}
