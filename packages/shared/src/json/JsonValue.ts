export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

// Plain assignment of "__proto__" would set the prototype instead of a key.
const setEntry = (record: JsonObject, key: string, value: JsonValue): void => {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
};

/**
 * Narrows an unknown value (typically the output of JSON.parse) into a JsonValue.
 * Values JSON cannot carry (functions, symbols, undefined, non-finite numbers) yield undefined.
 */
export const toJsonValue = (value: unknown): JsonValue | undefined => {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const entry of value) {
      const converted = toJsonValue(entry);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof value === "object") {
    const record: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted === undefined) return undefined;
      setEntry(record, key, converted);
    }
    return record;
  }
  return undefined;
};

const sortKeys = (value: JsonValue): JsonValue => {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (!isJsonObject(value)) return value;
  const sorted: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    setEntry(sorted, key, sortKeys(value[key]));
  }
  return sorted;
};

/** Key-order independent serialization, used for duplicate detection. */
export const canonicalStringify = (value: JsonValue): string => JSON.stringify(sortKeys(value));

export type JsonTypeName = "string" | "number" | "boolean" | "null" | "array" | "object";

export const jsonTypeOf = (value: JsonValue): JsonTypeName => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") return "object";
  if (typeof value === "string") return "string";
  if (typeof value === "number") return "number";
  return "boolean";
};
