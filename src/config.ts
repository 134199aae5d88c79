import { join, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface ServerConfig {
  root: string;
  host: string;
  port: number;
  maxBodyBytes: number;
}

export interface DataPaths {
  notesDir: string;
  transactionsDir: string;
  scrapesDir: string;
  weightsDir: string;
  notesCsv: string;
  transactionsCsv: string;
  scrapesCsv: string;
  weightsCsv: string;
}

const ConfigSchema = z.object({
  root: z.string().min(1, "data root must not be empty"),
  host: z.string().min(1, "host must not be empty"),
  port: z.coerce.number().int().min(0).max(65535),
  maxBodyBytes: z.coerce.number().int().positive(),
});

export const DEFAULTS = {
  root: "./data",
  host: "127.0.0.1",
  port: 8080,
  maxBodyBytes: 10 * 1024 * 1024,
} as const;

/**
 * Resolve configuration from the CLI argument and environment.
 * The data root comes from argv first, then PERSONAL_SERVER_ROOT.
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const parsed = ConfigSchema.safeParse({
    root: argv[0] ?? env["PERSONAL_SERVER_ROOT"] ?? DEFAULTS.root,
    host: env["PERSONAL_SERVER_HOST"] ?? DEFAULTS.host,
    port: env["PERSONAL_SERVER_PORT"] ?? DEFAULTS.port,
    maxBodyBytes: env["PERSONAL_SERVER_MAX_BODY_BYTES"] ?? DEFAULTS.maxBodyBytes,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") ?? "config";
    throw new ConfigError(`Invalid configuration for '${field}': ${issue?.message ?? "invalid value"}`);
  }

  return { ...parsed.data, root: resolve(parsed.data.root) };
}

export function dataPaths(root: string): DataPaths {
  const notesDir = join(root, "notes");
  const transactionsDir = join(root, "transactions");
  const scrapesDir = join(root, "scrapes");
  const weightsDir = join(root, "weights");

  return {
    notesDir,
    transactionsDir,
    scrapesDir,
    weightsDir,
    notesCsv: join(notesDir, "notes.csv"),
    transactionsCsv: join(transactionsDir, "transactions.csv"),
    scrapesCsv: join(scrapesDir, "scrapes.csv"),
    weightsCsv: join(weightsDir, "weights.csv"),
  };
}
