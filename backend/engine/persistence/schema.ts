// persistence/schema.ts
// Persisted shapes: the JSON document type and the fixed set of record keys.

//////////////////////////// Basics ////////////////////////////

export type Json = null | boolean | number | string | Json[] | JsonObject;
export type JsonObject = { [k: string]: Json };

export const DATA_KEYS = ["data_a", "data_b", "data_c"] as const;
export type DataKey = (typeof DATA_KEYS)[number];

export const STORAGE_TABLE = "storage";

//////////////////////////// Guards ////////////////////////////

export function isJsonObject(x: Json | undefined): x is JsonObject {
  return x !== null && typeof x === "object" && !Array.isArray(x);
}

/**
 * Narrow an arbitrary value to Json. Rejects anything JSON.parse could not
 * have produced (functions, undefined, non-finite numbers, class instances).
 */
export function toJson(x: unknown): Json | undefined {
  if (x === null || typeof x === "string" || typeof x === "boolean") return x;
  if (typeof x === "number") return Number.isFinite(x) ? x : undefined;
  if (Array.isArray(x)) {
    const out: Json[] = [];
    for (const item of x) {
      const v = toJson(item);
      if (v === undefined) return undefined;
      out.push(v);
    }
    return out;
  }
  if (typeof x === "object" && x !== null && Object.getPrototypeOf(x) === Object.prototype) {
    // fromEntries defines own properties, so a "__proto__" key stays a plain key
    const entries: [string, Json][] = [];
    for (const [k, item] of Object.entries(x)) {
      const v = toJson(item);
      if (v === undefined) return undefined;
      entries.push([k, v]);
    }
    return Object.fromEntries(entries);
  }
  return undefined;
}
