import type { IncomingMessage } from "node:http";
import { MalformedBodyError, PayloadTooLargeError } from "../errors.js";
import type { JsonObject } from "../types.js";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type BodySource = Pick<IncomingMessage, "headers"> & AsyncIterable<unknown>;

/**
 * Read the whole body as UTF-8. An oversized body is still read to the end,
 * discarding its bytes, so the 413 reply goes out on a connection whose
 * request has been consumed.
 */
export async function readBody(req: BodySource, maxBytes: number): Promise<string> {
  const declared = Number(req.headers["content-length"] ?? 0);
  let tooLarge = declared > maxBytes;

  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    if (tooLarge) continue;
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total > maxBytes) {
      tooLarge = true;
      chunks.length = 0;
      continue;
    }
    chunks.push(buf);
  }

  if (tooLarge) throw new PayloadTooLargeError(maxBytes);
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Decode a request body. Empty means `{}`; a non-JSON body shaped like
 * `a=1&b=2` is read as URL-encoded pairs.
 */
export function parseBody(raw: string): JsonObject {
  if (raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    if (raw.includes("=") && !raw.includes("{")) {
      return Object.fromEntries(new URLSearchParams(raw.trim()));
    }
    throw new MalformedBodyError(err instanceof Error ? err.message : String(err));
  }

  if (!isJsonObject(parsed)) {
    throw new MalformedBodyError("body must be a JSON object");
  }
  return parsed;
}
