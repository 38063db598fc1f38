import { Logger } from "tslog";

/** tslog level ids, lowest first. */
const LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevelName = (typeof LEVELS)[number];

/**
 * Minimum level for new loggers. `DIAGKIT_LOG_LEVEL` takes a level name;
 * otherwise production logs from "info" and everything else from "silly".
 */
export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const requested = env.DIAGKIT_LOG_LEVEL?.toLowerCase();
  const index = LEVELS.findIndex((name) => name === requested);
  if (index !== -1) {
    return index;
  }
  return env.NODE_ENV === "production" ? 3 : 0;
}

export function createLogger(name: string): Logger<unknown> {
  return new Logger({
    name,
    type: "pretty",
    minLevel: resolveMinLevel(),
  });
}
