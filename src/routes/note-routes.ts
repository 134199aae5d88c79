import { z } from "zod";
import type { Router } from "../http/router.js";
import { parseInput, parseListQuery } from "../http/validate.js";
import { NoteRepository } from "../storage/repositories/note-repository.js";
import { toCell } from "../utils.js";
import type { AppContext } from "./context.js";

export const NoteSchema = z.object({
  title: z
    .string({ required_error: "Missing 'title'", invalid_type_error: "'title' must be a string" })
    .trim()
    .min(1, "Missing 'title'")
    .describe("Note title; also names the Markdown file."),
  content: z.unknown().transform(toCell).describe("Markdown body."),
  tags: z
    .union([z.array(z.unknown()).transform((tags) => tags.map(toCell).join(",")), z.string()])
    .nullish()
    .describe("A list of tags or a comma-separated string."),
});

export function registerNoteRoutes(router: Router, app: AppContext): void {
  function getRepo(): NoteRepository {
    return new NoteRepository(app.paths);
  }

  router.post("/notes", async (ctx) => {
    const { title, content, tags } = parseInput(NoteSchema, await ctx.body());
    const note = await getRepo().save({ title, content, tags: tags ?? "" });
    return { body: { ok: true, note } };
  });

  router.get("/notes", async (ctx) => {
    const items = await getRepo().list(parseListQuery(ctx.query));
    return { body: { ok: true, items } };
  });
}
