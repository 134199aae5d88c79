import type { Router } from "../http/router.js";
import { parseListQuery } from "../http/validate.js";
import { WeightRepository } from "../storage/repositories/weight-repository.js";
import type { AppContext } from "./context.js";

export function registerWeightRoutes(router: Router, app: AppContext): void {
  function getRepo(): WeightRepository {
    return new WeightRepository(app.paths);
  }

  router.post("/weights", async (ctx) => {
    const weight = await getRepo().save(await ctx.body());
    return { body: { ok: true, weight } };
  });

  router.get("/weights", async (ctx) => {
    const items = await getRepo().list(parseListQuery(ctx.query));
    return { body: { ok: true, items } };
  });
}
