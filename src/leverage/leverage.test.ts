/**
 * Calculator correctness tests:
 *   1. Valuation engine
 *   2. Portfolio aggregation and risk
 *   3. Scenario simulation
 *   4. Import / export
 *   5. Workspace session
 *
 * Prices come from an in-process fake source; nothing touches the network.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PriceFeed } from "../market/price-feed.js";
import { err, ok, type CoinTable, type PriceSource } from "../market/price-source.js";
import { staticPriceMap } from "../market/fallback-data.js";
import { setLogLevel } from "../utils/logger.js";
import {
  aggregate,
  assessRisk,
  formatConcentration,
  fundingFee,
} from "./portfolio-aggregator.js";
import type { Position, PositionValuation } from "./position.js";
import {
  parsePositions,
  serializePositions,
  valuationsToCsv,
  writeExportFile,
} from "./position-io.js";
import { clampMove, resetMoves, simulate } from "./scenario-simulator.js";
import {
  calcLiquidationPrice,
  calcTokens,
  valuate,
  valuatePositions,
} from "./valuation-engine.js";
import { Workspace } from "./workspace.js";

// ── Helpers ──

setLogLevel("silent");

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    id: overrides.id ?? `pos-${Math.random().toString(36).slice(2, 10)}`,
    coin: "BTC",
    margin: 1000,
    leverage: 5,
    stopLossPct: 0,
    takeProfitPct: 0,
    ...overrides,
  };
}

function makeValuation(coin: string, margin: number, leverage: number, price: number, stopLossPct = 0): PositionValuation {
  return valuate(makePosition({ coin, margin, leverage, stopLossPct }), price, 0.5);
}

const TOP_COINS: CoinTable = {
  BTC: { coinId: "bitcoin", price: 67_000, rank: 1 },
  ETH: { coinId: "ethereum", price: 3_500, rank: 2 },
};

function createFakeSource(overrides: Partial<PriceSource> = {}): PriceSource {
  return {
    name: "Fake",
    getCurrentPrices: vi.fn(async () => ok(staticPriceMap())),
    getTopCoins: vi.fn(async (_limit: number) => ok(TOP_COINS)),
    getHistory: vi.fn(async (_coinId: string, _days: number) =>
      ok([
        { timestamp: "2026-10-17T00:00:00.000Z", price: 66_000 },
        { timestamp: "2026-10-18T00:00:00.000Z", price: 67_000 },
      ]),
    ),
    ...overrides,
  };
}

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "leverage-test-"));
}

// ════════════════════════════════════════════════════════════════════
// 1. Valuation engine
// ════════════════════════════════════════════════════════════════════

describe("Valuation Engine", () => {
  it("should value a 5x BTC long with stop-loss and take-profit", () => {
    const pos = makePosition({ coin: "BTC", margin: 1000, leverage: 5, stopLossPct: 5, takeProfitPct: 10 });
    const v = valuate(pos, 67_000, 0.5, "bitcoin");

    expect(v.positionSizeUsd).toBe(5000);
    expect(v.tokens).toBeCloseTo(5000 / 67_000, 12);
    // 67000 × (1 - 0.2 + 0.005) = 67000 × 0.805
    expect(v.liquidationPrice).toBeCloseTo(53_935, 6);
    // (63650 - 67000) × 0.074626… = -250
    expect(v.stopLossPnl).toBe(-250);
    // (73700 - 67000) × 0.074626… = 500
    expect(v.takeProfitPnl).toBe(500);
    expect(v.coinId).toBe("bitcoin");
    expect(v.distanceToLiquidationPct).toBeCloseTo(19.5, 9);
    expect(v.nearLiquidation).toBe(false);
  });

  it("should leave stop-loss and take-profit P/L absent when not configured", () => {
    const v = valuate(makePosition({ stopLossPct: 0, takeProfitPct: 0 }), 100, 0.5);
    expect(v.stopLossPnl).toBeNull();
    expect(v.takeProfitPnl).toBeNull();
  });

  it("should hold tokens = position size / price", () => {
    for (const price of [0.000012, 1, 150, 67_000]) {
      const v = valuate(makePosition({ margin: 250, leverage: 4 }), price, 0.5);
      expect(v.tokens).toBe(1000 / price);
      expect(v.tokens).toBeGreaterThanOrEqual(0);
    }
  });

  it("should degrade to zero tokens and no liquidation price at zero price", () => {
    const v = valuate(makePosition({ margin: 100, leverage: 10 }), 0, 0.5);
    expect(v.tokens).toBe(0);
    expect(v.liquidationPrice).toBeNull();
    expect(v.distanceToLiquidationPct).toBeNull();
    expect(v.nearLiquidation).toBe(false);
    expect(calcTokens(1000, -1)).toBe(0);
  });

  it("should move liquidation closer to price as leverage increases", () => {
    const leverages = [2, 3, 5, 10, 20];
    const liqs = leverages.map((lev) => calcLiquidationPrice(100, lev, 0.5) ?? Number.NaN);
    // 50.5, 67.17, 80.5, 90.5, 95.5
    for (let i = 1; i < liqs.length; i++) {
      expect(liqs[i]).toBeGreaterThan(liqs[i - 1]);
      expect(100 - liqs[i]).toBeLessThan(100 - liqs[i - 1]);
    }
    expect(liqs[0]).toBeCloseTo(50.5, 9);
    expect(liqs[4]).toBeCloseTo(95.5, 9);
  });

  it("should raise liquidation price with a higher maintenance margin", () => {
    const low = calcLiquidationPrice(100, 10, 0.1) ?? 0;
    const high = calcLiquidationPrice(100, 10, 5) ?? 0;
    expect(low).toBeCloseTo(90.1, 9);
    expect(high).toBeCloseTo(95, 9);
  });

  it("should flag positions whose liquidation is within 5% of price", () => {
    expect(valuate(makePosition({ leverage: 20 }), 100, 0.5).nearLiquidation).toBe(true); // 95.5
    expect(valuate(makePosition({ leverage: 10 }), 100, 0.5).nearLiquidation).toBe(false); // 90.5
  });

  it("should skip inert positions and report coins without a price", () => {
    const positions = [
      makePosition({ margin: 0 }),
      makePosition({ leverage: 0 }),
      makePosition({ id: "btc", coin: "BTC", margin: 100, leverage: 2 }),
      makePosition({ id: "doge", coin: "DOGE", margin: 100, leverage: 2 }),
    ];
    const pass = valuatePositions(positions, TOP_COINS, 0.5);

    expect(pass.skippedCount).toBe(2);
    expect(pass.valuations.map((v) => v.positionId)).toEqual(["btc"]);
    expect(pass.valuations[0].price).toBe(67_000);
    expect(pass.unpriced.map((p) => p.id)).toEqual(["doge"]);
  });
});

// ════════════════════════════════════════════════════════════════════
// 2. Portfolio aggregation
// ════════════════════════════════════════════════════════════════════

describe("Portfolio Aggregator", () => {
  it("should group exposure by coin and sum positions on the same coin", () => {
    const valuations = [
      makeValuation("BTC", 1000, 3, 67_000),
      makeValuation("BTC", 1000, 7, 67_000),
      makeValuation("ETH", 1000, 2, 3_500),
    ];
    const summary = aggregate(valuations);

    expect(summary.exposureByCoin).toEqual({ BTC: 10_000, ETH: 2_000 });
    expect(summary.totalExposure).toBe(12_000);
    expect(summary.totalMargin).toBe(3_000);
    expect(summary.weightedLeverage).toBe(4);
    expect(summary.positionCount).toBe(3);

    const sum = Object.values(summary.exposureByCoin).reduce((a, b) => a + b, 0);
    expect(Math.abs(sum - summary.totalExposure)).toBeLessThan(1e-9);

    expect(summary.exposureBreakdown.map((e) => e.coin)).toEqual(["BTC", "ETH"]);
    expect(summary.exposureBreakdown[0].percent.toFixed(1)).toBe("83.3");
    expect(summary.exposureBreakdown[1].percent.toFixed(1)).toBe("16.7");
    expect(formatConcentration(summary.concentration)).toBe("BTC 83.3%, ETH 16.7%");
  });

  it("should fold coins beyond the top three into Others", () => {
    const valuations = [
      makeValuation("ADA", 600, 1, 0.45),
      makeValuation("BTC", 1000, 5, 67_000),
      makeValuation("SUI", 400, 1, 1.5),
      makeValuation("ETH", 500, 5, 3_500),
      makeValuation("SOL", 500, 3, 150),
    ];
    const { concentration } = aggregate(valuations);

    expect(concentration.top.map((e) => e.coin)).toEqual(["BTC", "ETH", "SOL"]);
    expect(concentration.othersPercent).toBeCloseTo(10, 9);
    const total = concentration.top.reduce((s, e) => s + e.percent, 0) + (concentration.othersPercent ?? 0);
    expect(Math.abs(total - 100)).toBeLessThanOrEqual(0.1);
    expect(formatConcentration(concentration)).toBe("BTC 50.0%, ETH 25.0%, SOL 15.0%, Others 10.0%");
  });

  it("should report zeros and no risk level for an empty portfolio", () => {
    const summary = aggregate([]);
    expect(summary.totalMargin).toBe(0);
    expect(summary.totalExposure).toBe(0);
    expect(summary.weightedLeverage).toBe(0);
    expect(summary.fundingFeeEstimate).toBe(0);
    expect(summary.risk).toBeUndefined();
    expect(formatConcentration(summary.concentration)).toBe("No exposure");
  });

  it("should estimate funding fees on total exposure", () => {
    expect(fundingFee(12_000)).toBeCloseTo(2.4, 10);
    expect(fundingFee(12_000, 0.001)).toBeCloseTo(12, 10);
    const summary = aggregate([makeValuation("BTC", 1000, 10, 67_000)], { fundingRate: 0.0005 });
    expect(summary.fundingRate).toBe(0.0005);
    expect(summary.fundingFeeEstimate).toBeCloseTo(5, 10);
  });

  it("should rate 2x leverage with 5% average stop as Low", () => {
    const risk = assessRisk(10_000, 5_000, [5]);
    expect(risk.level).toBe("Low");
    expect(risk.leverageRatio).toBe(2);
    expect(risk.avgStopLossPct).toBe(5);
  });

  it("should ignore unset stops when averaging", () => {
    expect(assessRisk(10_000, 5_000, [4, 0, 6]).avgStopLossPct).toBe(5);
    expect(assessRisk(10_000, 5_000, [4, 0, 6]).level).toBe("Low");
  });

  it("should rate High when no position has a stop-loss", () => {
    const risk = assessRisk(2_000, 2_000, [0, 0]);
    expect(risk.level).toBe("High");
    expect(risk.avgStopLossPct).toBeNull();
    expect(risk.rationale).toBe("No stop-loss set on any position.");
  });

  it("should apply Low, then Medium, then High in order", () => {
    expect(assessRisk(10_000, 5_000, [6]).level).toBe("Medium"); // ratio 2, stop too wide for Low
    expect(assessRisk(30_000, 10_000, [20]).level).toBe("Medium"); // ratio 3
    expect(assessRisk(40_000, 10_000, [10]).level).toBe("Medium"); // avg stop 10
    expect(assessRisk(40_000, 10_000, [15]).level).toBe("High");
  });

  it("should attach a risk assessment built from the valuations", () => {
    const summary = aggregate([
      makeValuation("BTC", 1000, 2, 67_000, 4),
      makeValuation("ETH", 1000, 2, 3_500, 6),
    ]);
    expect(summary.risk?.level).toBe("Low");
    expect(summary.risk?.rationale).toBe("Overall leverage 2.00x with tight stops (avg 5.0%).");
  });
});

// ════════════════════════════════════════════════════════════════════
// 3. Scenario simulation
// ════════════════════════════════════════════════════════════════════

describe("Scenario Simulator", () => {
  const valuations = [
    makeValuation("BTC", 1000, 3, 67_000),
    makeValuation("ETH", 1000, 2, 3_500),
    makeValuation("BTC", 1000, 7, 67_000),
  ];

  it("should produce exactly zero P/L when every move is zero", () => {
    const result = simulate(valuations, {});
    expect(result.netPnl).toBe(0);
    expect(result.results).toEqual([
      { coin: "BTC", movePct: 0, pnl: 0 },
      { coin: "ETH", movePct: 0, pnl: 0 },
    ]);
  });

  it("should combine positions that share a coin", () => {
    const result = simulate(valuations, { BTC: 10, ETH: -20 });
    // BTC: 10% of 10000 exposure; ETH: -20% of 2000
    expect(result.results).toEqual([
      { coin: "BTC", movePct: 10, pnl: 1000 },
      { coin: "ETH", movePct: -20, pnl: -400 },
    ]);
    expect(result.netPnl).toBeCloseTo(600, 6);
  });

  it("should clamp moves to ±50%", () => {
    expect(clampMove(80)).toBe(50);
    expect(clampMove(-75)).toBe(-50);
    expect(clampMove(Number.NaN)).toBe(0);
    const result = simulate(valuations, { ETH: -90 });
    expect(result.results[1]).toEqual({ coin: "ETH", movePct: -50, pnl: -1000 });
  });

  it("should not modify the valuations", () => {
    const before = structuredClone(valuations);
    simulate(valuations, { BTC: 25, ETH: 25 });
    expect(valuations).toEqual(before);
  });

  it("should reset every coin to zero", () => {
    expect(resetMoves(["BTC", "ETH"])).toEqual({ BTC: 0, ETH: 0 });
  });
});

// ════════════════════════════════════════════════════════════════════
// 4. Import / export
// ════════════════════════════════════════════════════════════════════

describe("Position Import / Export", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should round-trip positions through JSON", () => {
    const positions = [
      makePosition({ id: "a", coin: "BTC", margin: 1000, leverage: 5, stopLossPct: 5, takeProfitPct: 10 }),
      makePosition({ id: "b", coin: "ETH", margin: 250.5, leverage: 2.5 }),
    ];
    const parsed = parsePositions(serializePositions(positions));
    expect(parsed).toEqual({ ok: true, positions });
  });

  it("should write snake_case field names", () => {
    const json = serializePositions([makePosition({ id: "a", stopLossPct: 3, takeProfitPct: 7 })]);
    expect(JSON.parse(json)).toEqual([
      { id: "a", coin: "BTC", margin: 1000, leverage: 5, stop_loss_pct: 3, take_profit_pct: 7 },
    ]);
  });

  it("should backfill missing ids and default stops", () => {
    const parsed = parsePositions('[{"coin":"eth","margin":100,"leverage":2}]');
    if (!parsed.ok) {
      throw new Error(parsed.message);
    }
    expect(parsed.positions).toHaveLength(1);
    expect(parsed.positions[0].id).toMatch(UUID_RE);
    expect(parsed.positions[0]).toMatchObject({
      coin: "ETH",
      margin: 100,
      leverage: 2,
      stopLossPct: 0,
      takeProfitPct: 0,
    });
  });

  it("should reject malformed JSON", () => {
    const parsed = parsePositions("[{not json");
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.message.startsWith("Invalid JSON:")).toBe(true);
    }
  });

  it("should reject records that break the schema", () => {
    const parsed = parsePositions(
      '[{"coin":"BTC","margin":100,"leverage":2,"stop_loss_pct":150,"take_profit_pct":0}]',
    );
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.message).toContain("Invalid positions file at /0/stop_loss_pct");
    }
    expect(parsePositions('{"coin":"BTC"}').ok).toBe(false);
  });

  it("should reject a file that repeats an id", () => {
    const parsed = parsePositions(
      JSON.stringify([
        { id: "a", coin: "BTC", margin: 100, leverage: 2 },
        { coin: "SOL", margin: 50, leverage: 3 },
        { id: "a", coin: "ETH", margin: 200, leverage: 4 },
      ]),
    );
    expect(parsed).toEqual({ ok: false, message: 'Duplicate position id "a".' });
  });

  it("should flatten valuations to formatted CSV", () => {
    const v = valuate(
      makePosition({ coin: "BTC", margin: 1000, leverage: 5, stopLossPct: 5, takeProfitPct: 10 }),
      67_000,
      0.5,
    );
    expect(valuationsToCsv([v]).split("\n")).toEqual([
      "Coin,Price (USD),Tokens,Position Size (USD),Margin (USD),Liquidation Price (USD),Stop Loss P/L (USD),Take Profit P/L (USD)",
      'BTC,"67,000.0000",0.074627,"$5,000.00","$1,000.00","53,935.0000",-$250.00,$500.00',
      "",
    ]);
  });

  it("should drop stop-loss and take-profit columns nobody uses", () => {
    const v = valuate(makePosition({ coin: "SOL", margin: 100, leverage: 2 }), 150, 0.5);
    const [header, row] = valuationsToCsv([v]).split("\n");
    expect(header).toBe(
      "Coin,Price (USD),Tokens,Position Size (USD),Margin (USD),Liquidation Price (USD)",
    );
    // 150 × (1 - 0.5 + 0.005) = 75.75
    expect(row).toBe("SOL,150.0000,1.333333,$200.00,$100.00,75.7500");
  });

  it("should write export files atomically", async () => {
    const target = await writeExportFile(path.join(tmpDir, "nested"), "positions.json", "[]");
    expect(target).toBe(path.join(tmpDir, "nested", "positions.json"));
    expect(fs.readFileSync(target, "utf-8")).toBe("[]");
    expect(fs.readdirSync(path.join(tmpDir, "nested"))).toEqual(["positions.json"]);
  });
});

// ════════════════════════════════════════════════════════════════════
// 5. Workspace session
// ════════════════════════════════════════════════════════════════════

describe("Workspace", () => {
  let source: PriceSource;
  let workspace: Workspace;

  beforeEach(() => {
    source = createFakeSource();
    workspace = new Workspace(new PriceFeed([source]));
  });

  function addConfigured(coin: string, margin: number, leverage: number, stopLossPct = 0): string {
    const added = workspace.addPosition(coin);
    const id = added.position?.id ?? "";
    workspace.updatePosition(id, { margin, leverage, stopLossPct });
    return id;
  }

  it("should add empty positions at the top of the list", () => {
    workspace.addPosition();
    const result = workspace.addPosition("eth");

    expect(result.success).toBe(true);
    expect(result.position).toMatchObject({
      coin: "ETH",
      margin: 0,
      leverage: 0,
      stopLossPct: 0,
      takeProfitPct: 0,
    });
    expect(workspace.getPositions().map((p) => p.coin)).toEqual(["ETH", "BTC"]);
    expect(workspace.getLastAddedCoin()).toBe("ETH");
  });

  it("should keep ids stable across edits", () => {
    const id = addConfigured("BTC", 1000, 5);
    const result = workspace.updatePosition(id, { coin: "eth", takeProfitPct: 20 });

    expect(result.success).toBe(true);
    expect(workspace.getPositions()).toEqual([
      { id, coin: "ETH", margin: 1000, leverage: 5, stopLossPct: 0, takeProfitPct: 20 },
    ]);
  });

  it("should reject invalid edits and leave the position unchanged", () => {
    const id = addConfigured("BTC", 1000, 5);

    expect(workspace.updatePosition(id, { margin: -1 }).message).toBe("Margin must be a non-negative number.");
    expect(workspace.updatePosition(id, { stopLossPct: 101 }).success).toBe(false);
    expect(workspace.updatePosition(id, { takeProfitPct: 2.5 }).success).toBe(false);
    expect(workspace.updatePosition("missing", { margin: 1 }).message).toBe("Position missing not found.");
    expect(workspace.getPositions()[0]).toMatchObject({ margin: 1000, leverage: 5, stopLossPct: 0 });
  });

  it("should remove one position or clear them all", () => {
    const first = addConfigured("BTC", 100, 2);
    addConfigured("ETH", 100, 2);

    expect(workspace.removePosition(first)).toBe(true);
    expect(workspace.removePosition(first)).toBe(false);
    expect(workspace.getPositions()).toHaveLength(1);
    expect(workspace.clearPositions()).toBe(1);
    expect(workspace.getPositions()).toEqual([]);
    expect(workspace.getLastAddedCoin()).toBeNull();
  });

  it("should evaluate valuations, totals and skipped positions", async () => {
    addConfigured("BTC", 1000, 5, 5);
    addConfigured("ETH", 500, 4, 5);
    workspace.addPosition("SOL"); // inert

    const snapshot = await workspace.evaluate();

    expect(snapshot.valuations.map((v) => v.coin)).toEqual(["ETH", "BTC"]);
    expect(snapshot.skippedCount).toBe(1);
    expect(snapshot.summary.totalMargin).toBe(1500);
    expect(snapshot.summary.totalExposure).toBe(7000);
    expect(snapshot.summary.risk?.level).toBe("Medium");
    expect(snapshot.priceSource).toBe("Fake");
    expect(snapshot.livePrices).toBe(true);
    expect(snapshot.advisories).toEqual(["1 position(s) skipped because Margin or Leverage = 0"]);
  });

  it("should price supported coins outside the top list", async () => {
    addConfigured("PAAL", 100, 2);
    const snapshot = await workspace.evaluate();
    expect(snapshot.valuations[0]).toMatchObject({ coin: "PAAL", coinId: "paal-ai", price: 0.1 });
  });

  it("should report positions on coins without a price", async () => {
    addConfigured("DOGE", 100, 2);
    const snapshot = await workspace.evaluate();
    expect(snapshot.valuations).toEqual([]);
    expect(snapshot.unpriced.map((p) => p.coin)).toEqual(["DOGE"]);
    expect(snapshot.advisories).toEqual(["No price available for DOGE; those positions are not valued."]);
  });

  it("should fall back to static prices with an advisory when sources fail", async () => {
    const failing = createFakeSource({
      getCurrentPrices: vi.fn(async () => err("offline")),
      getTopCoins: vi.fn(async (_limit: number) => err("offline")),
    });
    const offline = new Workspace(new PriceFeed([failing]));
    const id = offline.addPosition("BTC").position?.id ?? "";
    offline.updatePosition(id, { margin: 1000, leverage: 5 });

    const snapshot = await offline.evaluate();

    expect(snapshot.priceSource).toBe("Static");
    expect(snapshot.livePrices).toBe(false);
    expect(snapshot.valuations[0].price).toBe(67_000);
    expect(snapshot.advisories[0]).toBe(
      "Live coin list unavailable; showing approximate values. Live prices unavailable; showing approximate values.",
    );

    const again = await offline.evaluate();
    expect(again.priceSource).toBe("Static");
    expect(failing.getTopCoins).toHaveBeenCalledTimes(1);
    expect(failing.getCurrentPrices).toHaveBeenCalledTimes(1);
  });

  it("should keep the current list when an import is malformed", () => {
    addConfigured("BTC", 1000, 5);
    const before = workspace.getPositions();

    const result = workspace.importJson('[{"coin":"BTC","margin":"lots"}]');

    expect(result.success).toBe(false);
    expect(result.message.startsWith("Error loading positions: Invalid positions file")).toBe(true);
    expect(workspace.getPositions()).toEqual(before);
  });

  it("should keep the current list when an import repeats an id", () => {
    addConfigured("BTC", 1000, 5);
    const before = workspace.getPositions();

    const result = workspace.importJson(
      '[{"id":"a","coin":"BTC","margin":100,"leverage":2},{"id":"a","coin":"ETH","margin":200,"leverage":4}]',
    );

    expect(result).toEqual({ success: false, message: 'Error loading positions: Duplicate position id "a".' });
    expect(workspace.getPositions()).toEqual(before);
  });

  it("should round-trip the list through export and import", () => {
    addConfigured("BTC", 1000, 5, 5);
    addConfigured("ETH", 200, 3);

    const other = new Workspace(new PriceFeed([createFakeSource()]));
    const result = other.importJson(workspace.exportJson());

    expect(result).toEqual({ success: true, message: "Loaded 2 position(s).", count: 2 });
    expect(other.getPositions()).toEqual(workspace.getPositions());
    expect(other.getLastAddedCoin()).toBe("ETH");
  });

  it("should export valued positions as CSV", async () => {
    addConfigured("BTC", 1000, 5);
    const csv = await workspace.exportCsv();
    expect(csv.split("\n")[1]).toBe('BTC,"67,000.0000",0.074627,"$5,000.00","$1,000.00","53,935.0000"');
  });

  it("should write the JSON export to disk", async () => {
    const dir = createTempDir();
    try {
      addConfigured("BTC", 1000, 5);
      const target = await workspace.writeExport(dir, "json");
      expect(target).toBe(path.join(dir, "positions.json"));
      expect(fs.readFileSync(target, "utf-8")).toBe(workspace.exportJson());
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should simulate scenario moves without touching positions", async () => {
    addConfigured("BTC", 1000, 5);
    const before = workspace.getPositions();

    expect(workspace.setScenarioMove("btc", 75)).toBe(50);
    const moved = await workspace.evaluate();
    expect(moved.scenario.results).toEqual([{ coin: "BTC", movePct: 50, pnl: 2500 }]);
    expect(workspace.getPositions()).toEqual(before);

    expect(workspace.resetScenario()).toEqual({ BTC: 0 });
    const reset = await workspace.evaluate();
    expect(reset.scenario.netPnl).toBe(0);
  });

  it("should validate settings and apply them to valuations", async () => {
    addConfigured("BTC", 1000, 5);

    const rejected = workspace.updateSettings({ maintenanceMarginPct: 10 });
    expect(rejected.success).toBe(false);
    expect(rejected.settings.maintenanceMarginPct).toBe(0.5);

    const accepted = workspace.updateSettings({ maintenanceMarginPct: 1, fundingRate: 0.001 });
    expect(accepted.success).toBe(true);

    const snapshot = await workspace.evaluate();
    // 67000 × (1 - 0.2 + 0.01)
    expect(snapshot.valuations[0].liquidationPrice).toBeCloseTo(54_270, 6);
    expect(snapshot.summary.fundingFeeEstimate).toBeCloseTo(5, 10);
  });

  it("should load history for the last added coin by default", async () => {
    addConfigured("ETH", 100, 2);
    const result = await workspace.getHistory();

    expect(result.success).toBe(true);
    expect(result.history).toMatchObject({ coin: "ETH", coinId: "ethereum", live: true, source: "Fake" });
    expect(source.getHistory).toHaveBeenCalledWith("ethereum", 7);
  });

  it("should fall back to the first valued coin once the last added one is removed", async () => {
    addConfigured("BTC", 1000, 5);
    const eth = addConfigured("ETH", 100, 2);
    workspace.removePosition(eth);

    const result = await workspace.getHistory();

    expect(result.history?.coin).toBe("BTC");
    expect(source.getHistory).toHaveBeenCalledWith("bitcoin", 7);
  });

  it("should not default history to a coin that is not valued", async () => {
    addConfigured("SOL", 100, 2);
    workspace.addPosition("ETH"); // inert, but last added

    expect((await workspace.getHistory()).history?.coin).toBe("SOL");
  });

  it("should default history to BTC when nothing is valued", async () => {
    workspace.addPosition("ETH");
    expect((await workspace.getHistory()).history?.coin).toBe("BTC");
  });

  it("should refuse history for an unknown coin", async () => {
    const result = await workspace.getHistory("doge");
    expect(result).toEqual({ success: false, message: "Unknown coin DOGE." });
  });
});
