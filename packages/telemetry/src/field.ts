import type { FieldValue, Primitive } from "./types.js";

export function boolean(value: boolean): FieldValue<"boolean"> {
  return { kind: "boolean", value };
}

/** Non-integral numbers are truncated toward zero. */
export function integer(value: number | bigint): FieldValue<"integer"> {
  return {
    kind: "integer",
    value: typeof value === "bigint" ? value : BigInt(Math.trunc(value)),
  };
}

export function float(value: number): FieldValue<"float"> {
  return { kind: "float", value };
}

export function string(value: string): FieldValue<"string"> {
  return { kind: "string", value };
}

export function sequence(value: readonly Primitive[]): FieldValue<"sequence"> {
  return { kind: "sequence", value: Object.freeze([...value]) };
}
