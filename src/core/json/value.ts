/**
 * Generic JSON value model
 *
 * Embedded state blobs differ per page template, so extraction walks them as
 * plain JSON and narrows with the guards below instead of site-specific types.
 */

export type JsonPrimitive = null | boolean | number | string;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export function parseJson(text: string): JsonValue | null {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}

/** True when the key exists and holds something other than null. */
export function has(obj: JsonObject, key: string): boolean {
  return obj[key] !== undefined && obj[key] !== null;
}

/** Follows a dotted path (`props.pageProps.product`) through objects only. */
export function getPath(root: JsonValue, path: string | readonly string[]): JsonValue | undefined {
  const keys = typeof path === "string" ? path.split(".") : path;
  let current: JsonValue | undefined = root;
  for (const key of keys) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** String view of a scalar; numbers are stringified, everything else is null. */
export function asString(value: JsonValue | undefined): string | null {
  if (typeof value === "string") {
    const t = value.trim();
    return t ? t : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

export function asNumber(value: JsonValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.replace(/,/g, ""));
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Loose truthiness for stock flags: true, non-zero numbers, "true"/"1". */
export function asBoolean(value: JsonValue | undefined): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return /^(true|1|yes|in_?stock|available)$/i.test(value.trim());
  return false;
}

export function asArray(value: JsonValue | undefined): JsonArray {
  return Array.isArray(value) ? value : [];
}

export function asObjects(value: JsonValue | undefined): JsonObject[] {
  return asArray(value).filter(isJsonObject);
}
