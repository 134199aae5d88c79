import type { DataPaths } from "../../config.js";
import { ID_PREFIXES, WEIGHT_COLUMNS, type JsonObject, type ListOptions, type WeightRecord } from "../../types.js";
import { isoNow, pick, shortId, toCell } from "../../utils.js";
import { CsvLog } from "../csv-log.js";

export const LB_PER_KG = 2.2046226218;

const POUND_UNITS = new Set(["lb", "lbs", "pound", "pounds"]);
const WEIGHT_KEYS = ["weight", "weight_kg", "kg", "weight_lb", "lb"] as const;

export type WeightUnit = "kg" | "lb";

/** First number embedded in a value: `82.5`, `"82.5kg"`, `"180 lb"`. */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const match = /[-+]?[0-9]*\.?[0-9]+/.exec(value.trim());
  return match ? Number.parseFloat(match[0]) : null;
}

/**
 * Unit precedence: explicit `unit`, then a unit written into the value,
 * then the key the value came from; kilograms otherwise.
 */
export function resolveWeightUnit(payload: JsonObject): { value: unknown; unit: WeightUnit } {
  const key = WEIGHT_KEYS.find((k) => pick(payload, k) !== undefined);
  const value = key ? payload[key] : undefined;

  const explicit = toCell(payload["unit"]).trim().toLowerCase();
  if (explicit) {
    return { value, unit: POUND_UNITS.has(explicit) ? "lb" : "kg" };
  }

  const text = toCell(value).toLowerCase();
  if (text.includes("lb") || text.includes("pound")) return { value, unit: "lb" };
  if (text.includes("kg")) return { value, unit: "kg" };

  return { value, unit: key === "weight_lb" || key === "lb" ? "lb" : "kg" };
}

export function convertWeight(amount: number, unit: WeightUnit): { kg: number; lb: number } {
  return unit === "lb" ? { kg: amount / LB_PER_KG, lb: amount } : { kg: amount, lb: amount * LB_PER_KG };
}

export class WeightRepository {
  private log: CsvLog<(typeof WEIGHT_COLUMNS)[number]>;

  constructor(paths: DataPaths) {
    this.log = new CsvLog(paths.weightsCsv, WEIGHT_COLUMNS);
  }

  async save(payload: JsonObject): Promise<WeightRecord> {
    const { value, unit } = resolveWeightUnit(payload);
    const amount = toNumber(value);
    const converted = amount === null ? null : convertWeight(amount, unit);
    const bodyFat = toNumber(pick(payload, "body_fat_pct", "body_fat", "bodyFat", "bf"));

    const record: WeightRecord = {
      id: shortId(ID_PREFIXES.weight),
      date: toCell(pick(payload, "date", "timestamp") ?? isoNow()),
      weight_kg: converted ? converted.kg.toFixed(3) : "",
      weight_lb: converted ? converted.lb.toFixed(3) : "",
      body_fat_pct: bodyFat === null ? "" : bodyFat.toFixed(2),
      source: toCell(pick(payload, "source", "device")),
      notes: toCell(pick(payload, "notes", "memo")),
      raw_json: JSON.stringify(payload),
    };
    await this.log.append(record);
    return record;
  }

  list(opts?: ListOptions): Promise<WeightRecord[]> {
    return this.log.list(opts);
  }
}
