/**
 * Any value JSON.parse can produce.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * A JSON object with string keys.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Narrow a parsed JSON value to an object. Arrays and null are rejected.
 */
export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
