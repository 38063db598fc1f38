/**
 * Origin/lifetime group of a field. `None` marks cross-session
 * identifiers that sit at the top level of a submission.
 */
export type FieldCategory = "None" | "Session" | "App" | "UserSystem" | "UserConfig";

/** Element type allowed inside a sequence field. */
export type Primitive = boolean | number | string;

export interface FieldValueMap {
  boolean: boolean;
  /** Signed integer; bigint so 64-bit identifiers keep every bit */
  integer: bigint;
  float: number;
  string: string;
  sequence: readonly Primitive[];
}

export type FieldKind = keyof FieldValueMap;

/** A value tagged with its kind. */
export type FieldValue<K extends FieldKind = FieldKind> = K extends FieldKind
  ? { readonly kind: K; readonly value: FieldValueMap[K] }
  : never;

/** One named, typed diagnostic fact. */
export type Field<K extends FieldKind = FieldKind> = K extends FieldKind
  ? {
      readonly category: FieldCategory;
      readonly name: string;
      readonly kind: K;
      readonly value: FieldValueMap[K];
    }
  : never;

/**
 * Consumer of visited fields. One method per value kind, plus
 * `complete()` which finalizes the session.
 */
export interface TelemetryBackend {
  visitBoolean(field: Field<"boolean">): void;
  visitInteger(field: Field<"integer">): void;
  visitFloat(field: Field<"float">): void;
  visitString(field: Field<"string">): void;
  visitSequence(field: Field<"sequence">): void;
  complete(): void;
}

/** Credentials sent with every request to the remote service. */
export interface ServiceCredentials {
  username: string;
  token: string;
}

/**
 * Remote telemetry / verification service. Transport and wire format
 * are up to the implementation.
 */
export interface TelemetryService {
  submit(endpointUrl: string, credentials: ServiceCredentials, payload: string): Promise<void>;
  verify(endpointUrl: string, credentials: ServiceCredentials): Promise<boolean>;
}

export type ReadTitleResult =
  | { status: "success"; title: string }
  | { status: "error"; reason: string };

/** Source of the human-readable name of the loaded program. */
export interface AppLoader {
  readTitle(): ReadTitleResult;
}
