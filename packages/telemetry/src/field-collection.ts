import type { Field, FieldCategory, FieldValue, TelemetryBackend } from "./types.js";

/**
 * Insertion-ordered, append-only list of fields.
 *
 * Adding a name that already exists appends a second record; both are
 * delivered to the backend, which decides how to merge them.
 */
export class FieldCollection implements Iterable<Field> {
  private readonly fields: Field[] = [];

  add(category: FieldCategory, name: string, value: FieldValue): void {
    this.fields.push(makeField(category, name, value));
  }

  /** Deliver every field, in insertion order, to the backend. */
  accept(backend: TelemetryBackend): void {
    for (const field of this.fields) {
      switch (field.kind) {
        case "boolean":
          backend.visitBoolean(field);
          break;
        case "integer":
          backend.visitInteger(field);
          break;
        case "float":
          backend.visitFloat(field);
          break;
        case "string":
          backend.visitString(field);
          break;
        case "sequence":
          backend.visitSequence(field);
          break;
      }
    }
  }

  get size(): number {
    return this.fields.length;
  }

  find(name: string): Field | undefined {
    return this.fields.find((f) => f.name === name);
  }

  filter(category: FieldCategory): Field[] {
    return this.fields.filter((f) => f.category === category);
  }

  toArray(): readonly Field[] {
    return [...this.fields];
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.fields[Symbol.iterator]();
  }
}

function makeField(category: FieldCategory, name: string, value: FieldValue): Field {
  return Object.freeze({ category, name, ...value });
}
