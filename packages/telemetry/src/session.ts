import {
  isScmDirty,
  resolveRemoteCredentials,
  type BuildInfo,
  type CpuCaps,
  type CpuFeatures,
  type TelemetrySettings,
} from "@diagkit/core";
import { createLogger } from "@diagkit/logger";
import { TelemetryIdStore } from "@diagkit/telemetry-id";
import { boolean, float, integer, string } from "./field.js";
import { FieldCollection } from "./field-collection.js";
import { JsonTelemetryBackend } from "./json-backend.js";
import { NullBackend } from "./null-backend.js";
import type { AppLoader, Field, TelemetryBackend, TelemetryService } from "./types.js";

const log = createLogger("telemetry:session");

export type SessionState = "constructing" | "active" | "finalizing" | "closed";

/** Field-name suffix for each reported CPU extension. */
const CPU_EXTENSIONS: ReadonlyArray<[keyof CpuFeatures, string]> = [
  ["aes", "AES"],
  ["avx", "AVX"],
  ["avx2", "AVX2"],
  ["bmi1", "BMI1"],
  ["bmi2", "BMI2"],
  ["fma", "FMA"],
  ["fma4", "FMA4"],
  ["sse", "SSE"],
  ["sse2", "SSE2"],
  ["sse3", "SSE3"],
  ["ssse3", "SSSE3"],
  ["sse4_1", "SSE41"],
  ["sse4_2", "SSE42"],
];

export interface TelemetrySessionOptions {
  settings: TelemetrySettings;
  buildInfo: BuildInfo;
  cpuCaps: CpuCaps;
  /** Remote capability; when absent the session always discards */
  service?: TelemetryService;
  appLoader?: AppLoader;
  idStore?: TelemetryIdStore;
  /** Wall clock in milliseconds since the epoch */
  now?: () => number;
  platform?: NodeJS.Platform;
}

export function osPlatformName(platform: NodeJS.Platform): string {
  switch (platform) {
    case "darwin":
      return "Apple";
    case "win32":
      return "Windows";
    case "linux":
      return "Linux";
    default:
      return "Unknown";
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One bounded instrumentation lifetime.
 *
 * Construction picks the backend and records the identifier, start time
 * and environment facts. `end()` records the shutdown time, flushes every
 * field through the backend and completes it. Neither step throws; failed
 * lookups are logged and the affected field is skipped or zeroed.
 */
export class TelemetrySession {
  private readonly collection = new FieldCollection();
  private readonly now: () => number;
  private currentBackend: TelemetryBackend | null;
  private currentState: SessionState = "constructing";

  constructor(options: TelemetrySessionOptions) {
    this.now = options.now ?? Date.now;
    this.currentBackend = selectBackend(options);

    // One-time top-level information
    const idStore = options.idStore ?? new TelemetryIdStore();
    this.collection.add("None", "TelemetryId", integer(idStore.getId()));

    // Session start
    this.collection.add("Session", "Init_Time", integer(this.now()));
    const title = readProgramName(options.appLoader);
    if (title !== null) {
      this.collection.add("Session", "ProgramName", string(title));
    }

    // Application
    const { buildInfo } = options;
    this.collection.add("App", "Git_IsDirty", boolean(isScmDirty(buildInfo)));
    this.collection.add("App", "Git_Branch", string(buildInfo.branch));
    this.collection.add("App", "Git_Revision", string(buildInfo.revision));
    this.collection.add("App", "BuildDate", string(buildInfo.buildDate));
    this.collection.add("App", "BuildName", string(buildInfo.buildName));

    // User system
    const { cpuCaps } = options;
    this.collection.add("UserSystem", "CPU_Model", string(cpuCaps.cpuString));
    this.collection.add("UserSystem", "CPU_BrandString", string(cpuCaps.brandString));
    this.collection.add("UserSystem", "CPU_Vendor", string(cpuCaps.vendor));
    for (const [key, suffix] of CPU_EXTENSIONS) {
      this.collection.add("UserSystem", `CPU_Extension_x64_${suffix}`, boolean(cpuCaps.features[key]));
    }
    this.collection.add(
      "UserSystem",
      "OsPlatform",
      string(osPlatformName(options.platform ?? process.platform)),
    );

    // User configuration
    const { settings } = options;
    this.collection.add("UserConfig", "Core_CpuCore", integer(settings.cpuCore));
    this.collection.add("UserConfig", "Renderer_ResolutionFactor", float(settings.resolutionFactor));
    this.collection.add("UserConfig", "Renderer_ToggleFramelimit", boolean(settings.toggleFramelimit));

    this.currentState = "active";
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** The selected backend, or null once the session is closed. */
  get backend(): TelemetryBackend | null {
    return this.currentBackend;
  }

  get fields(): readonly Field[] {
    return this.collection.toArray();
  }

  /**
   * Tear the session down: record the shutdown time, visit every field
   * with the backend, complete it and release it. Later calls do nothing.
   */
  end(): void {
    if (this.currentState !== "active") {
      log.warn(`end() called on a ${this.currentState} session; ignoring`);
      return;
    }

    this.currentState = "finalizing";
    this.collection.add("Session", "Shutdown_Time", integer(this.now()));

    const backend = this.currentBackend;
    this.currentBackend = null;
    if (backend) {
      try {
        this.collection.accept(backend);
        backend.complete();
      } catch (error) {
        log.error(`Failed to complete telemetry session: ${describeError(error)}`);
      }
    }
    this.currentState = "closed";
  }
}

function selectBackend(options: TelemetrySessionOptions): TelemetryBackend {
  const { settings, service } = options;
  if (!service) {
    log.debug("Telemetry disabled (no remote service available)");
    return new NullBackend();
  }
  if (!settings.enableTelemetry) {
    log.info("Telemetry disabled (user preference)");
    return new NullBackend();
  }
  const credentials = resolveRemoteCredentials(settings);
  if (!credentials) {
    log.info("Telemetry disabled (no username/token configured)");
    return new NullBackend();
  }
  log.info("Telemetry enabled, submitting to " + settings.telemetryEndpointUrl);
  return new JsonTelemetryBackend({
    endpointUrl: settings.telemetryEndpointUrl,
    username: credentials.username,
    token: credentials.token,
    service,
  });
}

function readProgramName(loader: AppLoader | undefined): string | null {
  if (!loader) {
    return null;
  }
  try {
    const result = loader.readTitle();
    if (result.status === "success") {
      return result.title;
    }
    log.debug(`Program name unavailable: ${result.reason}`);
  } catch (error) {
    log.debug(`Program name lookup threw: ${describeError(error)}`);
  }
  return null;
}
