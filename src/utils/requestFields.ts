// src/utils/requestFields.ts
// Loose readers for JSON request bodies. Missing or malformed values come
// back as NaN / "" so the validators downstream report them.
import { InvalidInputError } from "../lib/attainmentErrors";

export const toNumber = (value: unknown): number => {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return NaN;
};

export const toText = (value: unknown): string => (typeof value === "string" ? value.trim() : "");

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const toList = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

export const field = (value: unknown, key: string): unknown => (isRecord(value) ? value[key] : undefined);

/** Throws one 422 listing every problem found in a request body. */
export const rejectIfProblems = (message: string, problems: string[], details: Record<string, unknown> = {}) => {
  if (problems.length) throw new InvalidInputError(message, { ...details, problems }, 422);
};

/** Optional date filter; "" means absent, anything unparseable is null. */
export const toDate = (value: unknown): Date | null | undefined => {
  const text = toText(value);
  if (!text) return undefined;
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
};
