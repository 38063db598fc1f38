export type {
  FieldCategory,
  Primitive,
  FieldValueMap,
  FieldKind,
  FieldValue,
  Field,
  TelemetryBackend,
  ServiceCredentials,
  TelemetryService,
  ReadTitleResult,
  AppLoader,
} from "./types.js";
export { boolean, integer, float, string, sequence } from "./field.js";
export { FieldCollection } from "./field-collection.js";
export { NullBackend } from "./null-backend.js";
export { JsonTelemetryBackend } from "./json-backend.js";
export type { JsonTelemetryBackendOptions } from "./json-backend.js";
export { HttpTelemetryService } from "./http-service.js";
export { TelemetrySession, osPlatformName } from "./session.js";
export type { SessionState, TelemetrySessionOptions } from "./session.js";
export { verifyLogin } from "./verify-login.js";
export type { VerifyLoginOptions } from "./verify-login.js";
export { initTelemetrySession, verifyConfiguredLogin } from "./telemetry-init.js";
export type { TelemetryInitOptions } from "./telemetry-init.js";
