import { createLogger } from "@diagkit/logger";
import type {
  Field,
  FieldCategory,
  ServiceCredentials,
  TelemetryBackend,
  TelemetryService,
} from "./types.js";

const log = createLogger("telemetry:backend");

type JsonValue = boolean | number | string | JsonValue[] | { [key: string]: JsonValue };
type Section = Record<string, JsonValue>;

/** Named sections in the submitted document; `None` fields go at the top level. */
const SECTION_NAMES = ["App", "Session", "UserSystem", "UserConfig"] as const;

export interface JsonTelemetryBackendOptions extends ServiceCredentials {
  /** Remote endpoint the finished session is posted to */
  endpointUrl: string;
  service: TelemetryService;
}

/**
 * Backend that gathers fields into a JSON document grouped by category
 * and submits it to the remote service on `complete()`.
 *
 * A repeated name within a category overwrites the earlier value. A
 * top-level (`None`) field named like a section is dropped with a warning.
 * Integers outside the safe double range and non-finite floats are
 * written as strings.
 * Submission runs in the background; failures are logged, never thrown.
 */
export class JsonTelemetryBackend implements TelemetryBackend {
  private readonly options: JsonTelemetryBackendOptions;
  private readonly sections = new Map<FieldCategory, Section>();
  private submission: Promise<void> | null = null;

  constructor(options: JsonTelemetryBackendOptions) {
    this.options = options;
  }

  visitBoolean(field: Field<"boolean">): void {
    this.serialize(field, field.value);
  }

  visitInteger(field: Field<"integer">): void {
    this.serialize(field, integerToJson(field.value));
  }

  visitFloat(field: Field<"float">): void {
    this.serialize(field, Number.isFinite(field.value) ? field.value : String(field.value));
  }

  visitString(field: Field<"string">): void {
    this.serialize(field, field.value);
  }

  visitSequence(field: Field<"sequence">): void {
    this.serialize(field, [...field.value]);
  }

  complete(): void {
    if (this.submission) {
      log.warn("complete() called twice; ignoring");
      return;
    }
    const payload = this.toJson();
    this.submission = this.submit(payload);
  }

  /** Resolves once the submission started by `complete()` has settled. */
  whenSubmitted(): Promise<void> {
    return this.submission ?? Promise.resolve();
  }

  /** The document as it would be submitted now. */
  toJson(): string {
    const top: Section = { ...this.sections.get("None") };
    for (const name of SECTION_NAMES) {
      const section = this.sections.get(name);
      if (section) {
        top[name] = section;
      }
    }
    return JSON.stringify(top);
  }

  private serialize(field: Field, value: JsonValue): void {
    if (field.category === "None" && isSectionName(field.name)) {
      log.warn(`Dropping top-level field "${field.name}": the name is reserved for a section`);
      return;
    }
    let section = this.sections.get(field.category);
    if (!section) {
      section = {};
      this.sections.set(field.category, section);
    }
    section[field.name] = value;
  }

  private async submit(payload: string): Promise<void> {
    const { endpointUrl, username, token, service } = this.options;
    try {
      await service.submit(endpointUrl, { username, token }, payload);
      log.debug(`Submitted telemetry session to ${endpointUrl}`);
    } catch (error) {
      log.error(
        `Failed to submit telemetry session: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

function isSectionName(name: string): boolean {
  return SECTION_NAMES.some((section) => section === name);
}

function integerToJson(value: bigint): number | string {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}
