export { Workspace, defaultHistoryCoin } from "./workspace.js";
export type {
  WorkspaceOptions,
  WorkspaceResult,
  WorkspaceSnapshot,
  HistoryView,
  ExportFormat,
} from "./workspace.js";
export type { Position, PositionPatch, PositionValuation } from "./position.js";
export { createPosition, isInert, DEFAULT_COIN } from "./position.js";
export {
  valuate,
  valuatePositions,
  calcPositionSize,
  calcTokens,
  calcLiquidationPrice,
  calcStopLossPnl,
  calcTakeProfitPnl,
  calcMovePnl,
  calcDistanceToLiquidation,
  round2,
} from "./valuation-engine.js";
export type { ValuationPass } from "./valuation-engine.js";
export {
  aggregate,
  assessRisk,
  fundingFee,
  groupExposureByCoin,
  exposureBreakdown,
  concentration,
  formatConcentration,
  DEFAULT_FUNDING_RATE,
} from "./portfolio-aggregator.js";
export type {
  PortfolioSummary,
  RiskAssessment,
  RiskLevel,
  CoinExposure,
  Concentration,
} from "./portfolio-aggregator.js";
export { simulate, resetMoves, clampMove, scenarioCoins } from "./scenario-simulator.js";
export type { ScenarioMoves, ScenarioResult, CoinScenario } from "./scenario-simulator.js";
export {
  parsePositions,
  serializePositions,
  valuationsToCsv,
  writeExportFile,
  PositionRecordSchema,
} from "./position-io.js";
export type { PositionRecord, ParseResult } from "./position-io.js";

import { loadConfig, type AppConfig } from "../config/config.js";
import { createPriceFeed } from "../market/index.js";
import { Workspace } from "./workspace.js";

export interface LeverageService {
  workspace: Workspace;
  config: AppConfig;
}

let servicePromise: Promise<LeverageService> | null = null;

/** Lazily initialise and return the singleton workspace service. */
export function getLeverageService(): Promise<LeverageService> {
  if (!servicePromise) {
    servicePromise = (async () => {
      const config = loadConfig();
      const priceFeed = createPriceFeed({
        useLivePrices: config.settings.useLivePrices,
        http: { timeoutMs: config.fetchTimeoutMs },
      });
      const workspace = new Workspace(priceFeed, {
        settings: config.settings,
        topCoinsLimit: config.topCoinsLimit,
        historyDays: config.historyDays,
      });
      return { workspace, config };
    })();
  }
  return servicePromise;
}
