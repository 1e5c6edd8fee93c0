// src/lib/checksum.ts
import crypto from "crypto";

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

function canonicalize(value: unknown): Json {
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === "object") {
    const out: { [key: string]: Json } = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, v] of entries) {
      if (v !== undefined) out[key] = canonicalize(v);
    }
    return out;
  }
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") return value;
  return String(value);
}

/** JSON with object keys sorted, so equal data always serializes the same. */
export const canonicalJson = (value: unknown): string => JSON.stringify(canonicalize(value));

export const checksum = (value: unknown): string =>
  crypto.createHash("sha256").update(canonicalJson(value)).digest("hex");
