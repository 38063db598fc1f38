export { telemetrySettingsSchema } from "./config.js";
export type { TelemetrySettings, RemoteCredentials } from "./config.js";
export type { BuildInfo, CpuVendor, CpuFeatures, CpuCaps } from "./build-info.js";
