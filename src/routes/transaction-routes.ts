import type { Router } from "../http/router.js";
import { parseListQuery } from "../http/validate.js";
import { TransactionRepository } from "../storage/repositories/transaction-repository.js";
import type { AppContext } from "./context.js";

export function registerTransactionRoutes(router: Router, app: AppContext): void {
  function getRepo(): TransactionRepository {
    return new TransactionRepository(app.paths);
  }

  router.post("/transactions", async (ctx) => {
    const transaction = await getRepo().save(await ctx.body());
    return { body: { ok: true, transaction } };
  });

  router.get("/transactions", async (ctx) => {
    const items = await getRepo().list(parseListQuery(ctx.query));
    return { body: { ok: true, items } };
  });
}
