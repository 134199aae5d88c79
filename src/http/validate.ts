import { z } from "zod";
import { InvalidParameterError } from "../errors.js";

/** Parse with `schema`, surfacing the first issue as an InvalidParameterError. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".");
    const message = issue?.message ?? "Invalid request";
    // Messages that already name their field are used as written.
    throw new InvalidParameterError(!field || message.includes(`'${field}'`) ? message : `Invalid '${field}': ${message}`);
  }
  return result.data;
}

export const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional().describe("Max rows (default 100)."),
  offset: z.coerce.number().int().min(0).optional().describe("Rows to skip."),
});

export function parseListQuery(query: URLSearchParams): z.output<typeof ListQuerySchema> {
  return parseInput(ListQuerySchema, {
    limit: query.get("limit") ?? undefined,
    offset: query.get("offset") ?? undefined,
  });
}
