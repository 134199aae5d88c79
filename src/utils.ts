import { v7 as uuidv7 } from "uuid";
import type { JsonObject } from "./types.js";

/** Filename-safe UTC timestamp, e.g. `2026-10-19T04-39-00.123Z`. */
export function fileStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/:/g, "-");
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function slugify(text: string, fallback = "item", maxLength = 80): string {
  const slug = text
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9\-_\s]+/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .slice(0, maxLength)
    .replace(/^-+|-+$/g, "");
  return slug || fallback;
}

export function shortId(prefix = ""): string {
  return `${prefix}${uuidv7()}`;
}

export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

/** First present value among `keys`, or undefined. */
export function pick(payload: JsonObject, ...keys: string[]): unknown {
  for (const key of keys) {
    if (isPresent(payload[key])) return payload[key];
  }
  return undefined;
}

/** Scalars as text, anything structured as JSON, absent as "". */
export function toCell(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}
