import type { DataPaths } from "../../config.js";
import { ID_PREFIXES, NOTE_COLUMNS, type ListOptions, type NoteRecord } from "../../types.js";
import { fileStamp, shortId, slugify } from "../../utils.js";
import { CsvLog } from "../csv-log.js";
import { writeNewFile } from "../files.js";

export interface NoteInput {
  title: string;
  content: string;
  tags?: string;
}

export function renderNote(title: string, createdAt: string, tags: string, content: string): string {
  return `---\ntitle: ${title}\ncreated_at: ${createdAt}\ntags: ${tags}\n---\n\n${content}`;
}

export class NoteRepository {
  private log: CsvLog<(typeof NOTE_COLUMNS)[number]>;

  constructor(private paths: DataPaths) {
    this.log = new CsvLog(paths.notesCsv, NOTE_COLUMNS);
  }

  /** Writes the Markdown file first, then indexes it in notes.csv. */
  async save(input: NoteInput): Promise<NoteRecord> {
    const now = new Date();
    const createdAt = now.toISOString();
    const tags = input.tags ?? "";
    const base = `${fileStamp(now)}-${slugify(input.title, "note")}`;

    const filename = await writeNewFile(
      this.paths.notesDir,
      base,
      ".md",
      renderNote(input.title, createdAt, tags, input.content),
    );

    const record: NoteRecord = {
      id: shortId(ID_PREFIXES.note),
      title: input.title,
      filename,
      created_at: createdAt,
      tags,
    };
    await this.log.append(record);
    return record;
  }

  list(opts?: ListOptions): Promise<NoteRecord[]> {
    return this.log.list(opts);
  }
}
