import type { PositionValuation } from "./position.js";
import { calcMovePnl, round2 } from "./valuation-engine.js";

export const MIN_MOVE_PCT = -50;
export const MAX_MOVE_PCT = 50;

/** coin → hypothetical price move in percent */
export type ScenarioMoves = Record<string, number>;

export interface CoinScenario {
  coin: string;
  movePct: number;
  /** Combined P&L of every position on the coin, rounded to cents. */
  pnl: number;
}

export interface ScenarioResult {
  results: CoinScenario[];
  netPnl: number;
}

export function clampMove(movePct: number): number {
  if (!Number.isFinite(movePct)) {
    return 0;
  }
  return Math.min(MAX_MOVE_PCT, Math.max(MIN_MOVE_PCT, movePct));
}

/** Coins present among the valuations, in first-seen order. */
export function scenarioCoins(valuations: readonly PositionValuation[]): string[] {
  return [...new Set(valuations.map((v) => v.coin))];
}

/** Every coin back to a 0% move. */
export function resetMoves(coins: readonly string[]): ScenarioMoves {
  const moves: ScenarioMoves = {};
  for (const coin of coins) {
    moves[coin] = 0;
  }
  return moves;
}

/**
 * What-if P&L per coin if each coin's price moved by its configured percent.
 * Positions sharing a coin are summed. Inputs are not modified.
 */
export function simulate(
  valuations: readonly PositionValuation[],
  movesByCoin: ScenarioMoves,
): ScenarioResult {
  const results: CoinScenario[] = [];
  let netPnl = 0;

  for (const coin of scenarioCoins(valuations)) {
    const movePct = clampMove(movesByCoin[coin] ?? 0);
    let combined = 0;
    for (const v of valuations) {
      if (v.coin === coin) {
        combined += calcMovePnl(v.price, v.tokens, movePct);
      }
    }
    netPnl += combined;
    results.push({ coin, movePct, pnl: round2(combined) });
  }

  return { results, netPnl: round2(netPnl) };
}
