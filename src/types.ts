// ---- Identifiers ----

export type RecordId = string; // <prefix><UUIDv7>

export const ID_PREFIXES = {
  note: "note-",
  transaction: "txn-",
  scrape: "scrape-",
  weight: "wt-",
} as const;

// ---- Records ----

export interface NoteRecord {
  id: RecordId;
  title: string;
  filename: string;
  created_at: string;
  tags: string;
}

export interface TransactionRecord {
  id: RecordId;
  date: string;
  amount: string;
  merchant: string;
  category: string;
  account: string;
  notes: string;
  raw_json: string;
}

export interface ScrapeRecord {
  id: RecordId;
  url: string;
  fetched_at: string;
  filename_html: string;
  filename_txt: string;
  title: string;
}

export interface WeightRecord {
  id: RecordId;
  date: string;
  weight_kg: string;
  weight_lb: string;
  body_fat_pct: string;
  source: string;
  notes: string;
  raw_json: string;
}

// ---- Column layouts (order is the on-disk order) ----

export const NOTE_COLUMNS = ["id", "title", "filename", "created_at", "tags"] as const satisfies readonly (keyof NoteRecord)[];

export const TRANSACTION_COLUMNS = [
  "id",
  "date",
  "amount",
  "merchant",
  "category",
  "account",
  "notes",
  "raw_json",
] as const satisfies readonly (keyof TransactionRecord)[];

export const SCRAPE_COLUMNS = [
  "id",
  "url",
  "fetched_at",
  "filename_html",
  "filename_txt",
  "title",
] as const satisfies readonly (keyof ScrapeRecord)[];

export const WEIGHT_COLUMNS = [
  "id",
  "date",
  "weight_kg",
  "weight_lb",
  "body_fat_pct",
  "source",
  "notes",
  "raw_json",
] as const satisfies readonly (keyof WeightRecord)[];

// ---- Payloads ----

export type JsonObject = Record<string, unknown>;

export interface ListOptions {
  limit?: number;
  offset?: number;
}
