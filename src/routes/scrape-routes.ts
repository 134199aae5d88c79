import { z } from "zod";
import type { Router } from "../http/router.js";
import { parseInput, parseListQuery } from "../http/validate.js";
import { fetchUrl } from "../scraper/fetcher.js";
import { htmlToText } from "../scraper/html.js";
import { ScrapeRepository } from "../storage/repositories/scrape-repository.js";
import type { AppContext } from "./context.js";

export const ScrapeSchema = z.object({
  url: z
    .string({ required_error: "Missing 'url'", invalid_type_error: "'url' must be a string" })
    .trim()
    .min(1, "Missing 'url'")
    .describe("Page to fetch."),
});

export function registerScrapeRoutes(router: Router, app: AppContext): void {
  function getRepo(): ScrapeRepository {
    return new ScrapeRepository(app.paths);
  }

  router.post("/scrape", async (ctx) => {
    const { url } = parseInput(ScrapeSchema, await ctx.body());
    const page = await fetchUrl(url, { fetchImpl: app.fetchImpl, timeoutMs: app.scrapeTimeoutMs });
    const scrape = await getRepo().save({
      url: page.finalUrl,
      html: page.html,
      text: htmlToText(page.html),
      title: page.title,
    });
    return { body: { ok: true, scrape } };
  });

  router.get("/scrapes", async (ctx) => {
    const items = await getRepo().list(parseListQuery(ctx.query));
    return { body: { ok: true, items } };
  });
}
