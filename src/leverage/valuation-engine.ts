/**
 * Valuation formulas for leveraged long positions (isolated margin).
 * Every function here is pure.
 */

import type { CoinTable } from "../market/price-source.js";
import { isInert, type Position, type PositionValuation } from "./position.js";

/** Liquidation within this fraction of the current price is flagged. */
export const NEAR_LIQUIDATION_RATIO = 0.95;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Position size = margin × leverage */
export function calcPositionSize(margin: number, leverage: number): number {
  return margin * leverage;
}

/** Tokens held = position size / price; 0 when there is no usable price. */
export function calcTokens(positionSizeUsd: number, price: number): number {
  if (price <= 0) {
    return 0;
  }
  return positionSizeUsd / price;
}

/**
 * Liquidation price (long, isolated margin):
 *
 *   liqPrice = price × (1 - 1/leverage + maintenanceMarginPct/100)
 *
 * Returns null when price or leverage is not positive.
 */
export function calcLiquidationPrice(
  price: number,
  leverage: number,
  maintenanceMarginPct: number,
): number | null {
  if (price <= 0 || leverage <= 0) {
    return null;
  }
  return price * (1 - 1 / leverage + maintenanceMarginPct / 100);
}

/** P&L if price moves by `movePct` percent, for `tokens` held long. */
export function calcMovePnl(price: number, tokens: number, movePct: number): number {
  return (price * (1 + movePct / 100) - price) * tokens;
}

/** Loss at the stop, rounded to cents. null when no stop is configured. */
export function calcStopLossPnl(price: number, tokens: number, stopLossPct: number): number | null {
  if (stopLossPct <= 0) {
    return null;
  }
  return round2(calcMovePnl(price, tokens, -stopLossPct));
}

/** Gain at the target, rounded to cents. null when no target is configured. */
export function calcTakeProfitPnl(
  price: number,
  tokens: number,
  takeProfitPct: number,
): number | null {
  if (takeProfitPct <= 0) {
    return null;
  }
  return round2(calcMovePnl(price, tokens, takeProfitPct));
}

/** Distance from price down to liquidation, as a percent of price. */
export function calcDistanceToLiquidation(price: number, liquidationPrice: number | null): number | null {
  if (liquidationPrice === null || price <= 0) {
    return null;
  }
  return ((price - liquidationPrice) / price) * 100;
}

/**
 * Value one position at `price`. The caller filters inert positions first
 * (see valuatePositions); a zero price degrades to 0 tokens and no
 * liquidation price instead of failing.
 */
export function valuate(
  position: Position,
  price: number,
  maintenanceMarginPct: number,
  coinId = "",
): PositionValuation {
  const positionSizeUsd = calcPositionSize(position.margin, position.leverage);
  const tokens = calcTokens(positionSizeUsd, price);
  const liquidationPrice = calcLiquidationPrice(price, position.leverage, maintenanceMarginPct);

  return {
    positionId: position.id,
    coin: position.coin,
    coinId,
    price,
    margin: position.margin,
    leverage: position.leverage,
    stopLossPct: position.stopLossPct,
    takeProfitPct: position.takeProfitPct,
    positionSizeUsd,
    tokens,
    liquidationPrice,
    distanceToLiquidationPct: calcDistanceToLiquidation(price, liquidationPrice),
    nearLiquidation:
      liquidationPrice !== null && liquidationPrice >= price * NEAR_LIQUIDATION_RATIO,
    stopLossPnl: calcStopLossPnl(price, tokens, position.stopLossPct),
    takeProfitPnl: calcTakeProfitPnl(price, tokens, position.takeProfitPct),
  };
}

export interface ValuationPass {
  valuations: PositionValuation[];
  /** Positions with margin or leverage of 0. */
  skippedCount: number;
  /** Non-inert positions whose coin is missing from the coin table. */
  unpriced: Position[];
}

/** Value every non-inert position against the coin table, in list order. */
export function valuatePositions(
  positions: readonly Position[],
  coins: CoinTable,
  maintenanceMarginPct: number,
): ValuationPass {
  const valuations: PositionValuation[] = [];
  const unpriced: Position[] = [];
  let skippedCount = 0;

  for (const pos of positions) {
    if (isInert(pos)) {
      skippedCount++;
      continue;
    }
    const quote = coins[pos.coin];
    if (!quote) {
      unpriced.push(pos);
      continue;
    }
    valuations.push(valuate(pos, quote.price, maintenanceMarginPct, quote.coinId));
  }

  return { valuations, skippedCount, unpriced };
}
