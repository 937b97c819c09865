import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { errorMessage } from "../utils/errors.js";
import type { Position, PositionValuation } from "./position.js";

export const PositionRecordSchema = Type.Object({
  id: Type.Optional(Type.String({ minLength: 1 })),
  coin: Type.String({ minLength: 1 }),
  margin: Type.Number({ minimum: 0 }),
  leverage: Type.Number({ minimum: 0 }),
  stop_loss_pct: Type.Optional(Type.Integer({ minimum: 0, maximum: 100 })),
  take_profit_pct: Type.Optional(Type.Integer({ minimum: 0, maximum: 100 })),
});

/** On-disk shape of one position in a JSON export. */
export type PositionRecord = Static<typeof PositionRecordSchema>;

const PositionFileSchema = Type.Array(PositionRecordSchema);

export type ParseResult = { ok: true; positions: Position[] } | { ok: false; message: string };

export function toRecord(position: Position): Required<PositionRecord> {
  return {
    id: position.id,
    coin: position.coin,
    margin: position.margin,
    leverage: position.leverage,
    stop_loss_pct: position.stopLossPct,
    take_profit_pct: position.takeProfitPct,
  };
}

export function fromRecord(record: PositionRecord): Position {
  return {
    id: record.id ?? crypto.randomUUID(),
    coin: record.coin.trim().toUpperCase(),
    margin: record.margin,
    leverage: record.leverage,
    stopLossPct: record.stop_loss_pct ?? 0,
    takeProfitPct: record.take_profit_pct ?? 0,
  };
}

export function serializePositions(positions: readonly Position[]): string {
  return JSON.stringify(positions.map(toRecord), null, 2);
}

/**
 * Parse a JSON export. Records without an id get a fresh one; anything that
 * is not an array of position records, or that repeats an id, is rejected
 * with the first problem found.
 */
export function parsePositions(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, message: `Invalid JSON: ${errorMessage(err)}` };
  }

  if (!Value.Check(PositionFileSchema, raw)) {
    const first = Value.Errors(PositionFileSchema, raw).First();
    const where = first?.path ? ` at ${first.path}` : "";
    return {
      ok: false,
      message: `Invalid positions file${where}: ${first?.message ?? "unexpected shape"}`,
    };
  }

  const seen = new Set<string>();
  for (const record of raw) {
    if (record.id === undefined) {
      continue;
    }
    if (seen.has(record.id)) {
      return { ok: false, message: `Duplicate position id "${record.id}".` };
    }
    seen.add(record.id);
  }

  return { ok: true, positions: raw.map(fromRecord) };
}

// ── CSV ──

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

function formatFixed(value: number, digits: number): string {
  return new Intl.NumberFormat("en-US", {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  }).format(value);
}

function escapeCsv(field: string): string {
  if (/[",\n\r]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

interface CsvColumn {
  header: string;
  value: (v: PositionValuation) => string;
}

const BASE_COLUMNS: CsvColumn[] = [
  { header: "Coin", value: (v) => v.coin },
  { header: "Price (USD)", value: (v) => formatFixed(v.price, 4) },
  { header: "Tokens", value: (v) => formatFixed(v.tokens, 6) },
  { header: "Position Size (USD)", value: (v) => usd.format(v.positionSizeUsd) },
  { header: "Margin (USD)", value: (v) => usd.format(v.margin) },
  {
    header: "Liquidation Price (USD)",
    value: (v) => (v.liquidationPrice === null ? "" : formatFixed(v.liquidationPrice, 4)),
  },
];

const STOP_LOSS_COLUMN: CsvColumn = {
  header: "Stop Loss P/L (USD)",
  value: (v) => (v.stopLossPnl === null ? "" : usd.format(v.stopLossPnl)),
};

const TAKE_PROFIT_COLUMN: CsvColumn = {
  header: "Take Profit P/L (USD)",
  value: (v) => (v.takeProfitPnl === null ? "" : usd.format(v.takeProfitPnl)),
};

/**
 * Flatten valuations into a CSV table with display formatting. The stop-loss
 * and take-profit columns are left out when no row has a value for them.
 */
export function valuationsToCsv(valuations: readonly PositionValuation[]): string {
  const columns = [...BASE_COLUMNS];
  if (valuations.some((v) => v.stopLossPnl !== null)) {
    columns.push(STOP_LOSS_COLUMN);
  }
  if (valuations.some((v) => v.takeProfitPnl !== null)) {
    columns.push(TAKE_PROFIT_COLUMN);
  }

  const lines = [columns.map((c) => escapeCsv(c.header)).join(",")];
  for (const v of valuations) {
    lines.push(columns.map((c) => escapeCsv(c.value(v))).join(","));
  }
  return `${lines.join("\n")}\n`;
}

/** Write an export file atomically (temp file, then rename). Returns the final path. */
export async function writeExportFile(dir: string, fileName: string, content: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const target = path.join(dir, fileName);
  const tmpPath = `${target}.${crypto.randomUUID()}.tmp`;
  await fs.writeFile(tmpPath, content, "utf-8");
  await fs.rename(tmpPath, target);
  return target;
}
