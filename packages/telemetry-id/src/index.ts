export {
  TelemetryIdStore,
  TELEMETRY_ID_FILENAME,
  TELEMETRY_ID_BYTES,
  getTelemetryIdPath,
  generateTelemetryId,
  encodeId,
  decodeId,
  getTelemetryId,
  regenerateTelemetryId,
} from "./id-store.js";
export type { IdGenerator } from "./id-store.js";
