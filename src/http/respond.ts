import type { ServerResponse } from "node:http";
import type { JsonObject } from "../types.js";

export function sendJson(res: ServerResponse, status: number, body: JsonObject): void {
  const data = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(data, "utf-8"),
  });
  res.end(data);
}
