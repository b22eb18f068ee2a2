/**
 * JSON encoding for domain values. Bigints become digit strings and
 * undefined fields are dropped.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function toJson(value: unknown): JsonValue {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJson(item));
  }
  if (typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) {
        out[key] = toJson(field);
      }
    }
    return out;
  }
  return null;
}
