import {
  detectCpuCaps,
  loadBuildInfo,
  loadTelemetrySettings,
  type TelemetrySettings,
} from "@diagkit/core";
import { TelemetryIdStore, getTelemetryIdPath } from "@diagkit/telemetry-id";
import { HttpTelemetryService } from "./http-service.js";
import { TelemetrySession } from "./session.js";
import type { AppLoader, TelemetryService } from "./types.js";
import { verifyLogin } from "./verify-login.js";

export interface TelemetryInitOptions {
  env?: NodeJS.ProcessEnv;
  appLoader?: AppLoader;
  /** Set to null to run without any remote capability */
  service?: TelemetryService | null;
}

/**
 * Start a session wired to the process environment: settings and build
 * identity from env vars, CPU caps from the host, the identifier under
 * the configured user directory, HTTP transport. Malformed settings fall
 * back field by field, so a session is always returned.
 */
export function initTelemetrySession(options: TelemetryInitOptions = {}): TelemetrySession {
  const env = options.env ?? process.env;
  const settings = loadTelemetrySettings(env);
  const service = options.service === undefined ? new HttpTelemetryService() : options.service;

  return new TelemetrySession({
    settings,
    buildInfo: loadBuildInfo(env),
    cpuCaps: detectCpuCaps(),
    appLoader: options.appLoader,
    service: service ?? undefined,
    idStore: new TelemetryIdStore({ filePath: getTelemetryIdPath(env) }),
  });
}

/** Verify the configured username/token against the configured endpoint. */
export function verifyConfiguredLogin(
  settings: TelemetrySettings,
  onComplete: () => void,
  service: TelemetryService | null = new HttpTelemetryService(),
): Promise<boolean> {
  return verifyLogin(settings.username, settings.token, onComplete, {
    service: service ?? undefined,
    endpointUrl: settings.verifyEndpointUrl,
  });
}
