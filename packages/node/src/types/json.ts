/**
 * JSON rendering for domain values.
 *
 * Bigints become decimal strings and undefined properties are dropped;
 * everything else passes through.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

export function toJsonValue(value: unknown): JsonValue {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (typeof value === "object" && value !== null) {
    return toJsonObject(value);
  }
  return null;
}

export function toJsonObject(value: object): JsonObject {
  const out: Record<string, JsonValue> = {};
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) {
      out[key] = toJsonValue(item);
    }
  }
  return out;
}
