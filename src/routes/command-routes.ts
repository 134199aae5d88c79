import { z } from "zod";
import { MAX_TIMEOUT_SEC, runCommand, runCommands } from "../commands/runner.js";
import { InvalidParameterError } from "../errors.js";
import type { Router } from "../http/router.js";
import { parseInput } from "../http/validate.js";
import { toCell } from "../utils.js";

const TRUTHY = new Set(["true", "1", "yes", "on"]);

const flag = z.union([z.boolean(), z.string().transform((s) => TRUTHY.has(s.trim().toLowerCase()))]);

export const RunSchema = z.object({
  cmd: z.union([z.string(), z.array(z.unknown())]).nullish().describe("A command string, or a list of commands."),
  command: z.string().nullish().describe("Alias of a single-string cmd."),
  cmds: z.array(z.unknown()).nullish().describe("Commands to run in order."),
  commands: z.array(z.unknown()).nullish().describe("Alias of cmds."),
  timeout: z.coerce
    .number()
    .positive("'timeout' must be a positive number of seconds")
    .max(MAX_TIMEOUT_SEC, `'timeout' must be at most ${MAX_TIMEOUT_SEC} seconds`)
    .nullish(),
  cwd: z.string().nullish().describe("Working directory for every command."),
  stop_on_error: flag.nullish().describe("Stop a batch at the first failing command."),
});

const MISSING_COMMAND = "Missing 'cmd' or 'cmds'";

export function registerCommandRoutes(router: Router): void {
  router.post("/run", async (ctx) => {
    const input = parseInput(RunSchema, await ctx.body());
    const opts = { timeoutSec: input.timeout ?? undefined, cwd: input.cwd ?? undefined };

    const batch = input.cmds ?? input.commands ?? (Array.isArray(input.cmd) ? input.cmd : null);
    if (batch) {
      if (batch.length === 0) throw new InvalidParameterError(MISSING_COMMAND);
      const result = await runCommands(batch.map(toCell), { ...opts, stopOnError: input.stop_on_error ?? false });
      return { body: { ...result } };
    }

    const single = typeof input.cmd === "string" && input.cmd.trim() ? input.cmd : input.command;
    if (!single || !single.trim()) throw new InvalidParameterError(MISSING_COMMAND);

    const result = await runCommand(single, opts);
    return { body: { ...result } };
  });
}
