import {
  DEFAULT_SETTINGS,
  mergeSettings,
  type CalculatorSettings,
} from "../config/config.js";
import type { PriceFeed, PriceSnapshot } from "../market/price-feed.js";
import type { CoinTable, PricePoint } from "../market/price-source.js";
import { logger } from "../utils/logger.js";
import { aggregate, type PortfolioSummary } from "./portfolio-aggregator.js";
import {
  applyPatch,
  createPosition,
  DEFAULT_COIN,
  validatePatch,
  type Position,
  type PositionPatch,
  type PositionValuation,
} from "./position.js";
import {
  parsePositions,
  serializePositions,
  valuationsToCsv,
  writeExportFile,
} from "./position-io.js";
import {
  clampMove,
  resetMoves,
  simulate,
  type ScenarioMoves,
  type ScenarioResult,
} from "./scenario-simulator.js";
import { valuatePositions, type ValuationPass } from "./valuation-engine.js";

export interface WorkspaceOptions {
  settings?: CalculatorSettings;
  topCoinsLimit?: number;
  historyDays?: number;
}

export interface WorkspaceResult {
  success: boolean;
  message: string;
}

export interface WorkspaceSnapshot {
  positions: Position[];
  valuations: PositionValuation[];
  skippedCount: number;
  unpriced: Position[];
  summary: PortfolioSummary;
  scenario: ScenarioResult;
  scenarioMoves: ScenarioMoves;
  settings: CalculatorSettings;
  priceSource: string;
  livePrices: boolean;
  lastAddedCoin: string | null;
  advisories: string[];
}

export interface HistoryView {
  coin: string;
  coinId: string;
  points: PricePoint[];
  source: string;
  live: boolean;
  advisory?: string;
}

export type ExportFormat = "json" | "csv";

/** Coin whose history is shown when none is requested. */
export function defaultHistoryCoin(
  valuations: readonly PositionValuation[],
  lastAddedCoin: string | null,
): string {
  if (lastAddedCoin && valuations.some((v) => v.coin === lastAddedCoin)) {
    return lastAddedCoin;
  }
  return valuations[0]?.coin ?? DEFAULT_COIN;
}

/**
 * One user's calculator session: the position list, the last-added coin, the
 * per-coin scenario moves and the settings. Everything derived is recomputed
 * by evaluate() from the current list and the latest prices.
 */
export class Workspace {
  private positions: Position[] = [];
  private lastAddedCoin: string | null = null;
  private scenarioMoves: ScenarioMoves = {};
  private settings: CalculatorSettings;
  private priceFeed: PriceFeed;
  private topCoinsLimit: number;
  private historyDays: number;

  constructor(priceFeed: PriceFeed, opts: WorkspaceOptions = {}) {
    this.priceFeed = priceFeed;
    this.settings = { ...(opts.settings ?? DEFAULT_SETTINGS) };
    this.topCoinsLimit = opts.topCoinsLimit ?? 50;
    this.historyDays = opts.historyDays ?? 7;
    this.priceFeed.setUseLivePrices(this.settings.useLivePrices);
  }

  getPositions(): Position[] {
    return this.positions.map((p) => ({ ...p }));
  }

  getLastAddedCoin(): string | null {
    return this.lastAddedCoin;
  }

  /** Add an empty position at the top of the list. */
  addPosition(coin: string = DEFAULT_COIN): WorkspaceResult & { position?: Position } {
    if (coin.trim() === "") {
      return { success: false, message: "Coin must not be empty." };
    }
    const position = createPosition(coin.trim());
    this.positions.unshift(position);
    this.lastAddedCoin = position.coin;
    return { success: true, message: `Added ${position.coin} position.`, position: { ...position } };
  }

  updatePosition(id: string, patch: PositionPatch): WorkspaceResult & { position?: Position } {
    const pos = this.positions.find((p) => p.id === id);
    if (!pos) {
      return { success: false, message: `Position ${id} not found.` };
    }
    const problem = validatePatch(patch);
    if (problem) {
      return { success: false, message: problem };
    }
    applyPatch(pos, patch);
    return { success: true, message: `Updated ${pos.coin} position.`, position: { ...pos } };
  }

  removePosition(id: string): boolean {
    const idx = this.positions.findIndex((p) => p.id === id);
    if (idx === -1) {
      return false;
    }
    this.positions.splice(idx, 1);
    return true;
  }

  clearPositions(): number {
    const removed = this.positions.length;
    this.positions = [];
    this.lastAddedCoin = null;
    this.scenarioMoves = {};
    return removed;
  }

  /** Replace the list from a JSON export. On failure the current list is kept. */
  importJson(text: string): WorkspaceResult & { count?: number } {
    const parsed = parsePositions(text);
    if (!parsed.ok) {
      logger.warn(`[workspace] import rejected: ${parsed.message}`);
      return { success: false, message: `Error loading positions: ${parsed.message}` };
    }
    this.positions = parsed.positions;
    this.lastAddedCoin = parsed.positions[0]?.coin ?? null;
    return {
      success: true,
      message: `Loaded ${parsed.positions.length} position(s).`,
      count: parsed.positions.length,
    };
  }

  exportJson(): string {
    return serializePositions(this.positions);
  }

  async exportCsv(): Promise<string> {
    const { valuations } = await this.evaluate();
    return valuationsToCsv(valuations);
  }

  /** Write positions.json or positions.csv into `dir`. */
  async writeExport(dir: string, format: ExportFormat): Promise<string> {
    const content = format === "json" ? this.exportJson() : await this.exportCsv();
    const target = await writeExportFile(dir, `positions.${format}`, content);
    logger.info(`[workspace] exported ${this.positions.length} position(s) to ${target}`);
    return target;
  }

  getScenarioMoves(): ScenarioMoves {
    return { ...this.scenarioMoves };
  }

  /** Session-only; the move is clamped to ±50%. */
  setScenarioMove(coin: string, movePct: number): number {
    const clamped = clampMove(movePct);
    this.scenarioMoves[coin.toUpperCase()] = clamped;
    return clamped;
  }

  resetScenario(): ScenarioMoves {
    const coins = new Set([...Object.keys(this.scenarioMoves), ...this.positions.map((p) => p.coin)]);
    this.scenarioMoves = resetMoves([...coins]);
    return this.getScenarioMoves();
  }

  getSettings(): CalculatorSettings {
    return { ...this.settings };
  }

  updateSettings(patch: Partial<CalculatorSettings>): WorkspaceResult & { settings: CalculatorSettings } {
    const merged = mergeSettings(this.settings, patch);
    if (!merged.ok) {
      return { success: false, message: `Invalid settings: ${merged.message}`, settings: this.getSettings() };
    }
    this.settings = merged.settings;
    this.priceFeed.setUseLivePrices(this.settings.useLivePrices);
    return { success: true, message: "Settings updated.", settings: this.getSettings() };
  }

  private async valueAll(): Promise<{ coins: PriceSnapshot<CoinTable>; pass: ValuationPass }> {
    const coins = await this.priceFeed.getCoinTable(this.topCoinsLimit);
    const pass = valuatePositions(this.positions, coins.data, this.settings.maintenanceMarginPct);
    return { coins, pass };
  }

  /** Drop cached prices so the next evaluation refetches. */
  refreshPrices(): void {
    this.priceFeed.clearCache();
  }

  /** Full recomputation: prices → valuations → summary and scenario. */
  async evaluate(): Promise<WorkspaceSnapshot> {
    const { coins, pass } = await this.valueAll();
    const summary = aggregate(pass.valuations, { fundingRate: this.settings.fundingRate });
    const scenario = simulate(pass.valuations, this.scenarioMoves);

    const advisories: string[] = [];
    if (coins.advisory) {
      advisories.push(coins.advisory);
    }
    if (pass.skippedCount > 0) {
      advisories.push(`${pass.skippedCount} position(s) skipped because Margin or Leverage = 0`);
    }
    if (pass.unpriced.length > 0) {
      const unknown = [...new Set(pass.unpriced.map((p) => p.coin))].join(", ");
      advisories.push(`No price available for ${unknown}; those positions are not valued.`);
    }

    logger.debug(
      `[workspace] evaluated ${pass.valuations.length} position(s), exposure ${summary.totalExposure.toFixed(2)} (${coins.source})`,
    );

    return {
      positions: this.getPositions(),
      valuations: pass.valuations,
      skippedCount: pass.skippedCount,
      unpriced: pass.unpriced.map((p) => ({ ...p })),
      summary,
      scenario,
      scenarioMoves: this.getScenarioMoves(),
      settings: this.getSettings(),
      priceSource: coins.source,
      livePrices: coins.live,
      lastAddedCoin: this.lastAddedCoin,
      advisories,
    };
  }

  /**
   * Price history for `coin`. Without one, the last-added coin is used while a
   * valued position still holds it, then the first valued coin.
   */
  async getHistory(coin?: string): Promise<WorkspaceResult & { history?: HistoryView }> {
    const { coins, pass } = await this.valueAll();
    const symbol = (coin ?? defaultHistoryCoin(pass.valuations, this.lastAddedCoin)).toUpperCase();
    const quote = coins.data[symbol];
    if (!quote) {
      return { success: false, message: `Unknown coin ${symbol}.` };
    }
    const snapshot = await this.priceFeed.getHistory(quote.coinId, this.historyDays);
    return {
      success: true,
      message: `${snapshot.live ? "Live" : "Sample"} history for ${symbol}.`,
      history: {
        coin: symbol,
        coinId: quote.coinId,
        points: snapshot.data,
        source: snapshot.source,
        live: snapshot.live,
        ...(snapshot.advisory ? { advisory: snapshot.advisory } : {}),
      },
    };
  }
}
