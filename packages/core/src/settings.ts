import { z } from "zod";
import { createLogger } from "@diagkit/logger";
import {
  telemetrySettingsSchema,
  type RemoteCredentials,
  type TelemetrySettings,
} from "./types/config.js";

const log = createLogger("config");

const fields = telemetrySettingsSchema.shape;

const flag = z
  .enum(["1", "0", "true", "false", "on", "off"])
  .transform((v) => v === "1" || v === "true" || v === "on");

/**
 * Read one variable. Unset or blank yields undefined (the schema default);
 * a value the schema rejects is logged and yields `fallback`.
 */
function readVar<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback?: T,
): T | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    log.warn(`Ignoring malformed ${name}=${JSON.stringify(raw)}: ${result.error.issues[0]?.message ?? "invalid"}`);
    return fallback;
  }
  return result.data;
}

/**
 * Load telemetry settings from environment variables. Never throws.
 *
 * Each variable is checked on its own, so one bad value only costs its own
 * setting. An unreadable `DIAGKIT_TELEMETRY` turns telemetry off.
 */
export function loadTelemetrySettings(
  env: NodeJS.ProcessEnv = process.env,
): TelemetrySettings {
  return telemetrySettingsSchema.parse({
    enableTelemetry: readVar(env, "DIAGKIT_TELEMETRY", flag, false),
    telemetryEndpointUrl: readVar(env, "DIAGKIT_TELEMETRY_ENDPOINT", fields.telemetryEndpointUrl),
    verifyEndpointUrl: readVar(env, "DIAGKIT_VERIFY_ENDPOINT", fields.verifyEndpointUrl),
    username: readVar(env, "DIAGKIT_USERNAME", fields.username),
    token: readVar(env, "DIAGKIT_TOKEN", fields.token),
    cpuCore: readVar(env, "DIAGKIT_CPU_CORE", z.coerce.number().pipe(fields.cpuCore)),
    resolutionFactor: readVar(
      env,
      "DIAGKIT_RESOLUTION_FACTOR",
      z.coerce.number().pipe(fields.resolutionFactor),
    ),
    toggleFramelimit: readVar(env, "DIAGKIT_FRAME_LIMIT", flag),
  });
}

/** Credentials for remote submission, or null when either one is missing. */
export function resolveRemoteCredentials(
  settings: TelemetrySettings,
): RemoteCredentials | null {
  const username = settings.username.trim();
  const token = settings.token.trim();
  if (!username || !token) {
    return null;
  }
  return { username, token };
}
