import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type DataPaths, dataPaths } from "../../src/config.js";
import { parseCsv } from "../../src/storage/csv-log.js";
import { NoteRepository, renderNote } from "../../src/storage/repositories/note-repository.js";
import { ScrapeRepository } from "../../src/storage/repositories/scrape-repository.js";
import { TransactionRepository } from "../../src/storage/repositories/transaction-repository.js";
import {
  WeightRepository,
  convertWeight,
  resolveWeightUnit,
  toNumber,
} from "../../src/storage/repositories/weight-repository.js";

function csvRecords(path: string): string[][] {
  return parseCsv(readFileSync(path, "utf-8"));
}

describe("repositories", () => {
  let root: string;
  let paths: DataPaths;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "repos-"));
    paths = dataPaths(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("NoteRepository", () => {
    it("should write a Markdown file with front matter and index it", async () => {
      const repo = new NoteRepository(paths);
      const note = await repo.save({ title: "Weekly Review", content: "Went well.", tags: "review,weekly" });

      assert.match(note.id, /^note-/);
      assert.match(note.filename, /^\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.\d{3}Z-weekly-review\.md$/);

      const markdown = readFileSync(join(paths.notesDir, note.filename), "utf-8");
      assert.equal(
        markdown,
        `---\ntitle: Weekly Review\ncreated_at: ${note.created_at}\ntags: review,weekly\n---\n\nWent well.`,
      );

      assert.deepEqual(csvRecords(paths.notesCsv), [
        ["id", "title", "filename", "created_at", "tags"],
        [note.id, "Weekly Review", note.filename, note.created_at, "review,weekly"],
      ]);
    });

    it("should add exactly one row and one file per note", async () => {
      const repo = new NoteRepository(paths);
      await repo.save({ title: "Same", content: "a" });
      await repo.save({ title: "Same", content: "b" });
      await repo.save({ title: "Same", content: "c" });

      assert.equal(csvRecords(paths.notesCsv).length, 4);
      assert.equal(readdirSync(paths.notesDir).filter((f) => f.endsWith(".md")).length, 3);
    });

    it("should fall back to 'note' when the title has no slug", async () => {
      const note = await new NoteRepository(paths).save({ title: "???", content: "" });
      assert.match(note.filename, /Z-note\.md$/);
      assert.equal(note.tags, "");
    });

    it("should list notes in insertion order", async () => {
      const repo = new NoteRepository(paths);
      const first = await repo.save({ title: "One", content: "" });
      const second = await repo.save({ title: "Two", content: "" });

      const listed = await repo.list();
      assert.deepEqual(
        listed.map((n) => n.id),
        [first.id, second.id],
      );
      assert.deepEqual(listed[1], second);
    });

    it("should render front matter", () => {
      assert.equal(renderNote("T", "2026-01-01T00:00:00.000Z", "", "body"), "---\ntitle: T\ncreated_at: 2026-01-01T00:00:00.000Z\ntags: \n---\n\nbody");
    });
  });

  describe("TransactionRepository", () => {
    it("should map known fields and keep the whole payload", async () => {
      const payload = {
        date: "2026-05-01",
        amount: -12.5,
        payee: "Corner Cafe",
        category: "food",
        source: "visa",
        memo: "lunch",
        receipt_no: "R-77",
        tags: ["work", "meal"],
      };
      const txn = await new TransactionRepository(paths).save(payload);

      assert.match(txn.id, /^txn-/);
      assert.equal(txn.date, "2026-05-01");
      assert.equal(txn.amount, "-12.5");
      assert.equal(txn.merchant, "Corner Cafe");
      assert.equal(txn.category, "food");
      assert.equal(txn.account, "visa");
      assert.equal(txn.notes, "lunch");
      assert.deepEqual(JSON.parse(txn.raw_json), payload);
    });

    it("should preserve arbitrary extra keys in raw_json on disk", async () => {
      const payload = { amount: 3, "weird key": { nested: [1, "two"] }, flag: true };
      await new TransactionRepository(paths).save(payload);

      const [header, row] = csvRecords(paths.transactionsCsv);
      assert.deepEqual(header, ["id", "date", "amount", "merchant", "category", "account", "notes", "raw_json"]);
      assert.deepEqual(JSON.parse(row?.[7] ?? ""), payload);
    });

    it("should default the date and leave missing fields empty", async () => {
      const before = new Date().toISOString();
      const txn = await new TransactionRepository(paths).save({});
      const after = new Date().toISOString();

      assert.ok(txn.date >= before && txn.date <= after);
      assert.equal(txn.amount, "");
      assert.equal(txn.merchant, "");
      assert.equal(txn.raw_json, "{}");
    });

    it("should keep a zero amount", async () => {
      const txn = await new TransactionRepository(paths).save({ amount: 0 });
      assert.equal(txn.amount, "0");
    });
  });

  describe("ScrapeRepository", () => {
    it("should write html and text side by side", async () => {
      const scrape = await new ScrapeRepository(paths).save({
        url: "http://example.test/page",
        html: "<p>Hi</p>",
        text: "Hi",
        title: "A Page",
      });

      assert.match(scrape.id, /^scrape-/);
      assert.ok(scrape.filename_html.endsWith("-a-page.html"));
      assert.equal(scrape.filename_txt, scrape.filename_html.replace(/\.html$/, ".txt"));
      assert.equal(readFileSync(join(paths.scrapesDir, scrape.filename_html), "utf-8"), "<p>Hi</p>");
      assert.equal(readFileSync(join(paths.scrapesDir, scrape.filename_txt), "utf-8"), "Hi");

      assert.deepEqual(csvRecords(paths.scrapesCsv)[1], [
        scrape.id,
        "http://example.test/page",
        scrape.fetched_at,
        scrape.filename_html,
        scrape.filename_txt,
        "A Page",
      ]);
    });

    it("should name untitled pages 'page'", async () => {
      const scrape = await new ScrapeRepository(paths).save({ url: "http://x.test", html: "", text: "", title: "" });
      assert.ok(scrape.filename_html.endsWith("Z-page.html"));
    });
  });

  describe("WeightRepository", () => {
    it("should convert kilograms to pounds", async () => {
      const wt = await new WeightRepository(paths).save({ weight: 80, date: "2026-05-01" });
      assert.equal(wt.weight_kg, "80.000");
      assert.equal(wt.weight_lb, "176.370");
      assert.equal(wt.date, "2026-05-01");
    });

    it("should read the unit written into the value", async () => {
      const wt = await new WeightRepository(paths).save({ weight: "180 lb" });
      assert.equal(wt.weight_lb, "180.000");
      assert.equal(wt.weight_kg, "81.647");
    });

    it("should treat the weight_lb key as pounds", async () => {
      const wt = await new WeightRepository(paths).save({ weight_lb: 180 });
      assert.equal(wt.weight_kg, "81.647");
    });

    it("should prefer the explicit unit", async () => {
      const wt = await new WeightRepository(paths).save({ weight: "100", unit: "LBS" });
      assert.equal(wt.weight_lb, "100.000");
      assert.equal(wt.weight_kg, "45.359");
    });

    it("should format body fat and aliases", async () => {
      const wt = await new WeightRepository(paths).save({ kg: "82.5kg", bodyFat: "18.5%", device: "scale", memo: "am" });
      assert.equal(wt.weight_kg, "82.500");
      assert.equal(wt.body_fat_pct, "18.50");
      assert.equal(wt.source, "scale");
      assert.equal(wt.notes, "am");
    });

    it("should leave weight columns empty when nothing parses", async () => {
      const repo = new WeightRepository(paths);
      const wt = await repo.save({ weight: "heavy" });
      assert.equal(wt.weight_kg, "");
      assert.equal(wt.weight_lb, "");
      assert.equal(wt.body_fat_pct, "");

      const [header] = csvRecords(paths.weightsCsv);
      assert.deepEqual(header, ["id", "date", "weight_kg", "weight_lb", "body_fat_pct", "source", "notes", "raw_json"]);
    });
  });
});

describe("weight parsing", () => {
  it("should extract the first number", () => {
    assert.equal(toNumber("82.5kg"), 82.5);
    assert.equal(toNumber(" -3 "), -3);
    assert.equal(toNumber(".5"), 0.5);
    assert.equal(toNumber("none"), null);
    assert.equal(toNumber(null), null);
    assert.equal(toNumber(Number.NaN), null);
  });

  it("should resolve units in precedence order", () => {
    assert.deepEqual(resolveWeightUnit({ weight: "200 pounds" }), { value: "200 pounds", unit: "lb" });
    assert.deepEqual(resolveWeightUnit({ weight: "90kg" }), { value: "90kg", unit: "kg" });
    assert.deepEqual(resolveWeightUnit({ lb: 150, unit: "kg" }), { value: 150, unit: "kg" });
    assert.deepEqual(resolveWeightUnit({ lb: 150 }), { value: 150, unit: "lb" });
    assert.deepEqual(resolveWeightUnit({}), { value: undefined, unit: "kg" });
  });

  it("should convert between units", () => {
    const { kg, lb } = convertWeight(2.2046226218, "lb");
    assert.equal(kg, 1);
    assert.equal(lb, 2.2046226218);
  });
});
