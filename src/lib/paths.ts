// Path utilities for kbridge data and config files

import { join } from "node:path";

export const CONFIG_FILE_NAME = "kbridge.config.json";
export const DB_FILE_NAME = "kbridge.db";

/**
 * Get platform-specific data directory following the XDG Base Directory layout
 */
export function getDefaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const platform = process.platform;

  if (platform === "win32") {
    const appData = env.APPDATA || env.USERPROFILE;
    return appData ? join(appData, "kbridge") : join(process.cwd(), "kbridge-data");
  } else if (platform === "darwin") {
    const home = env.HOME;
    return home
      ? join(home, "Library", "Application Support", "kbridge")
      : join(process.cwd(), "kbridge-data");
  } else {
    // Linux/Unix - XDG_DATA_HOME or ~/.local/share
    const xdgDataHome = env.XDG_DATA_HOME;
    const home = env.HOME;
    if (xdgDataHome) {
      return join(xdgDataHome, "kbridge");
    } else if (home) {
      return join(home, ".local", "share", "kbridge");
    }
    return join(process.cwd(), "kbridge-data");
  }
}

/**
 * Database file inside a data directory
 */
export function getDbPath(dataDir: string): string {
  return join(dataDir, DB_FILE_NAME);
}
