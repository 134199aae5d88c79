import type { DataPaths } from "../../config.js";
import { ID_PREFIXES, SCRAPE_COLUMNS, type ListOptions, type ScrapeRecord } from "../../types.js";
import { fileStamp, shortId, slugify } from "../../utils.js";
import { CsvLog } from "../csv-log.js";
import { writeNewFiles } from "../files.js";

export interface ScrapeInput {
  url: string;
  html: string;
  text: string;
  title: string;
}

export class ScrapeRepository {
  private log: CsvLog<(typeof SCRAPE_COLUMNS)[number]>;

  constructor(private paths: DataPaths) {
    this.log = new CsvLog(paths.scrapesCsv, SCRAPE_COLUMNS);
  }

  async save(input: ScrapeInput): Promise<ScrapeRecord> {
    const now = new Date();
    const base = `${fileStamp(now)}-${slugify(input.title, "page")}`;

    const stem = await writeNewFiles(this.paths.scrapesDir, base, [
      { ext: ".html", content: input.html },
      { ext: ".txt", content: input.text },
    ]);
    const htmlName = `${stem}.html`;
    const txtName = `${stem}.txt`;

    const record: ScrapeRecord = {
      id: shortId(ID_PREFIXES.scrape),
      url: input.url,
      fetched_at: now.toISOString(),
      filename_html: htmlName,
      filename_txt: txtName,
      title: input.title,
    };
    await this.log.append(record);
    return record;
  }

  list(opts?: ListOptions): Promise<ScrapeRecord[]> {
    return this.log.list(opts);
  }
}
