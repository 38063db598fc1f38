import type { TelemetryBackend } from "./types.js";

/** Backend that discards everything. Used whenever telemetry is off. */
export class NullBackend implements TelemetryBackend {
  visitBoolean(): void {}
  visitInteger(): void {}
  visitFloat(): void {}
  visitString(): void {}
  visitSequence(): void {}
  complete(): void {}
}
