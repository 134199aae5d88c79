import type { JsonObject } from "../types.js";

export type HttpMethod = "GET" | "POST";

export interface RequestContext {
  method: string;
  path: string;
  query: URLSearchParams;
  /** Reads and decodes the request body; call at most once. */
  body(): Promise<JsonObject>;
}

export interface RouteResult {
  status?: number;
  body: JsonObject;
}

export type RouteHandler = (ctx: RequestContext) => Promise<RouteResult>;

export function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, "");
  return trimmed === "" ? "/" : trimmed;
}

export class Router {
  private routes = new Map<string, RouteHandler>();

  register(method: HttpMethod, path: string, handler: RouteHandler): void {
    const key = `${method} ${normalizePath(path)}`;
    if (this.routes.has(key)) throw new Error(`Route already registered: ${key}`);
    this.routes.set(key, handler);
  }

  get(path: string, handler: RouteHandler): void {
    this.register("GET", path, handler);
  }

  post(path: string, handler: RouteHandler): void {
    this.register("POST", path, handler);
  }

  match(method: string, path: string): RouteHandler | undefined {
    return this.routes.get(`${method.toUpperCase()} ${normalizePath(path)}`);
  }
}
