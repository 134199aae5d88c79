import { type IncomingMessage, type Server, type ServerResponse, createServer as createHttpServer } from "node:http";
import { type ServerConfig, dataPaths } from "./config.js";
import { PersonalServerError, RouteNotFoundError } from "./errors.js";
import { parseBody, readBody } from "./http/body.js";
import { sendJson } from "./http/respond.js";
import { Router } from "./http/router.js";
import { registerCommandRoutes } from "./routes/command-routes.js";
import type { AppContext } from "./routes/context.js";
import { registerNoteRoutes } from "./routes/note-routes.js";
import { registerScrapeRoutes } from "./routes/scrape-routes.js";
import { registerSystemRoutes } from "./routes/system-routes.js";
import { registerTransactionRoutes } from "./routes/transaction-routes.js";
import { registerWeightRoutes } from "./routes/weight-routes.js";
import type { FetchLike } from "./scraper/fetcher.js";

export interface ServerOptions {
  /** One stderr line per request. Defaults to true. */
  logRequests?: boolean;
  /** Replaces the global fetch for /scrape. */
  fetchImpl?: FetchLike;
  scrapeTimeoutMs?: number;
}

export function buildRouter(app: AppContext): Router {
  const router = new Router();
  registerSystemRoutes(router);
  registerCommandRoutes(router);
  registerNoteRoutes(router, app);
  registerTransactionRoutes(router, app);
  registerScrapeRoutes(router, app);
  registerWeightRoutes(router, app);
  return router;
}

function toErrorResponse(err: unknown): { status: number; body: { ok: false; error: string; code: string } } {
  if (err instanceof PersonalServerError) {
    return { status: err.status, body: { ok: false, error: err.message, code: err.code } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { ok: false, error: message, code: "INTERNAL_ERROR" } };
}

export function createServer(config: ServerConfig, options: ServerOptions = {}): Server {
  const router = buildRouter({
    paths: dataPaths(config.root),
    fetchImpl: options.fetchImpl,
    scrapeTimeoutMs: options.scrapeTimeoutMs,
  });
  const logRequests = options.logRequests ?? true;

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = performance.now();
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    let status: number;
    try {
      const handler = router.match(method, url.pathname);
      if (!handler) throw new RouteNotFoundError();

      const result = await handler({
        method,
        path: url.pathname,
        query: url.searchParams,
        body: async () => parseBody(await readBody(req, config.maxBodyBytes)),
      });
      status = result.status ?? 200;
      sendJson(res, status, result.body);
    } catch (err) {
      const mapped = toErrorResponse(err);
      status = mapped.status;
      if (status >= 500) console.error(`${method} ${url.pathname} failed:`, err);
      sendJson(res, status, mapped.body);
    }

    if (logRequests) {
      console.error(`${method} ${url.pathname} ${status} ${Math.round(performance.now() - started)}ms`);
    }
  }

  return createHttpServer((req, res) => {
    handle(req, res).catch((err) => {
      console.error("Unhandled request failure:", err);
      if (!res.headersSent) sendJson(res, 500, { ok: false, error: "Internal error", code: "INTERNAL_ERROR" });
      else res.destroy();
    });
  });
}

export interface RunningServer {
  server: Server;
  url: string;
  close(): Promise<void>;
}

export function startServer(config: ServerConfig, options: ServerOptions = {}): Promise<RunningServer> {
  const server = createServer(config, options);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      const bound = server.address();
      if (bound === null || typeof bound === "string") {
        reject(new Error(`Unexpected listen address: ${String(bound)}`));
        return;
      }
      const { address, port } = bound;
      const host = address.includes(":") ? `[${address}]` : address;
      resolve({
        server,
        url: `http://${host}:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
            server.closeAllConnections();
          }),
      });
    });
  });
}
