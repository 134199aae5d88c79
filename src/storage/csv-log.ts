import { access, link, mkdir, open, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { v7 as uuidv7 } from "uuid";
import { StorageWriteError, describeCause } from "../errors.js";
import type { ListOptions } from "../types.js";
import { toCell } from "../utils.js";

const LINE_END = "\r\n";

export const DEFAULT_LIST_LIMIT = 100;

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(",") + LINE_END;
}

/**
 * Split CSV text into records of fields. Quoted fields may contain commas,
 * newlines and `""` escapes. A trailing line break does not produce an empty record.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        current += c;
      }
    } else if (c === '"') {
      inQuotes = true;
    } else if (c === ",") {
      fields.push(current);
      current = "";
    } else if (c === "\r" || c === "\n") {
      if (c === "\r" && text[i + 1] === "\n") i += 1;
      fields.push(current);
      records.push(fields);
      fields = [];
      current = "";
    } else {
      current += c;
    }
  }

  if (current.length > 0 || fields.length > 0) {
    fields.push(current);
    records.push(fields);
  }
  return records;
}

export interface CsvContents {
  header: string[];
  rows: Record<string, string>[];
}

/**
 * Append-only CSV file with a fixed column order. The header row is written
 * by whichever writer creates the file; every write opens and closes the file.
 */
export class CsvLog<C extends string> {
  constructor(
    readonly path: string,
    readonly columns: readonly C[],
  ) {}

  async append(row: { readonly [K in C]?: unknown }): Promise<void> {
    const line = formatCsvLine(this.columns.map((column) => toCell(row[column])));

    try {
      await mkdir(dirname(this.path), { recursive: true });
      const created = await this.tryCreate(line);
      if (!created) {
        const handle = await open(this.path, "a");
        try {
          await handle.write(line);
        } finally {
          await handle.close();
        }
      }
    } catch (err) {
      throw new StorageWriteError(this.path, describeCause(err));
    }
  }

  async read(): Promise<CsvContents> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { header: [...this.columns], rows: [] };
      }
      throw err;
    }

    const [header = [], ...records] = parseCsv(text);
    const rows = records.filter((fields) => fields.length > 1 || fields[0] !== "").map((fields) => {
      const row: Record<string, string> = {};
      header.forEach((column, i) => {
        row[column] = fields[i] ?? "";
      });
      return row;
    });
    return { header, rows };
  }

  /** Rows in file order, keyed by this log's columns. */
  async list(opts: ListOptions = {}): Promise<Record<C, string>[]> {
    const { rows } = await this.read();
    const offset = opts.offset ?? 0;
    const limit = opts.limit ?? DEFAULT_LIST_LIMIT;

    return rows.slice(offset, offset + limit).map((row) => {
      const entries = this.columns.map((column) => [column, row[column] ?? ""] as const);
      return Object.fromEntries(entries) as Record<C, string>;
    });
  }

  /**
   * Publish header and first row together: the file is staged under a temporary
   * name and hard-linked into place, which fails if another writer got there first.
   * Returns false when the file already exists.
   */
  private async tryCreate(firstLine: string): Promise<boolean> {
    if (await exists(this.path)) return false;

    const staging = `${this.path}.${uuidv7()}.tmp`;
    await writeFile(staging, formatCsvLine(this.columns) + firstLine, { encoding: "utf-8", flag: "wx" });
    try {
      await link(staging, this.path);
      return true;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") return false;
      throw err;
    } finally {
      await rm(staging, { force: true });
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
