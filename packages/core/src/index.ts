export type {
  TelemetrySettings,
  RemoteCredentials,
  BuildInfo,
  CpuVendor,
  CpuFeatures,
  CpuCaps,
} from "./types/index.js";
export { telemetrySettingsSchema } from "./types/index.js";

export {
  API_BASE_URL,
  TELEMETRY_PATH,
  VERIFY_PATH,
  getTelemetryUrl,
  getVerifyUrl,
} from "./endpoints.js";
export { getUserConfigDir } from "./paths.js";
export { loadTelemetrySettings, resolveRemoteCredentials } from "./settings.js";
export { loadBuildInfo, isScmDirty } from "./build-info.js";
export { classifyCpuVendor, parseCpuInfo, detectCpuCaps } from "./cpu-caps.js";
