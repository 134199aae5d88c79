import type { DataPaths } from "../config.js";
import type { FetchLike } from "../scraper/fetcher.js";

export interface AppContext {
  paths: DataPaths;
  fetchImpl?: FetchLike;
  scrapeTimeoutMs?: number;
}
