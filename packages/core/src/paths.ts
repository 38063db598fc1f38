import { join } from "node:path";
import { homedir } from "node:os";

/**
 * Directory holding per-installation user configuration.
 * `DIAGKIT_CONFIG_DIR` overrides the default `~/.diagkit/config`.
 */
export function getUserConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DIAGKIT_CONFIG_DIR || join(homedir(), ".diagkit", "config");
}
