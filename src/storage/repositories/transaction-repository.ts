import type { DataPaths } from "../../config.js";
import {
  ID_PREFIXES,
  TRANSACTION_COLUMNS,
  type JsonObject,
  type ListOptions,
  type TransactionRecord,
} from "../../types.js";
import { isoNow, pick, shortId, toCell } from "../../utils.js";
import { CsvLog } from "../csv-log.js";

export class TransactionRepository {
  private log: CsvLog<(typeof TRANSACTION_COLUMNS)[number]>;

  constructor(paths: DataPaths) {
    this.log = new CsvLog(paths.transactionsCsv, TRANSACTION_COLUMNS);
  }

  /**
   * Accepts any object. Known columns are filled from the first present alias;
   * the full payload, unknown keys included, lands in raw_json.
   */
  async save(payload: JsonObject): Promise<TransactionRecord> {
    const record: TransactionRecord = {
      id: shortId(ID_PREFIXES.transaction),
      date: toCell(pick(payload, "date", "timestamp") ?? isoNow()),
      amount: toCell(pick(payload, "amount", "value")),
      merchant: toCell(pick(payload, "merchant", "payee")),
      category: toCell(pick(payload, "category", "type")),
      account: toCell(pick(payload, "account", "source")),
      notes: toCell(pick(payload, "notes", "memo")),
      raw_json: JSON.stringify(payload),
    };
    await this.log.append(record);
    return record;
  }

  list(opts?: ListOptions): Promise<TransactionRecord[]> {
    return this.log.list(opts);
  }
}
