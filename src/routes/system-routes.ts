import type { Router } from "../http/router.js";

export function registerSystemRoutes(router: Router): void {
  router.get("/ping", async () => ({ body: { ok: true, message: "pong" } }));
}
