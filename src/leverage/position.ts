import crypto from "node:crypto";

export const DEFAULT_COIN = "BTC";

export interface Position {
  id: string;
  coin: string; // "BTC", "ETH", etc.
  margin: number; // USD committed
  leverage: number;
  stopLossPct: number; // 0 = not set
  takeProfitPct: number; // 0 = not set
}

export type PositionPatch = Partial<Omit<Position, "id">>;

export interface PositionValuation {
  positionId: string;
  coin: string;
  coinId: string;
  price: number;
  margin: number;
  leverage: number;
  stopLossPct: number;
  takeProfitPct: number;

  positionSizeUsd: number; // margin × leverage
  tokens: number; // positionSizeUsd / price

  // Liquidation
  liquidationPrice: number | null; // null when price ≤ 0
  distanceToLiquidationPct: number | null;
  nearLiquidation: boolean; // within 5% of current price

  // P&L at the configured exits, null when not configured
  stopLossPnl: number | null;
  takeProfitPnl: number | null;
}

/** A position with no margin or no leverage contributes nothing and is skipped. */
export function isInert(position: Position): boolean {
  return position.margin === 0 || position.leverage === 0;
}

export function createPosition(coin: string = DEFAULT_COIN): Position {
  return {
    id: crypto.randomUUID(),
    coin: coin.toUpperCase(),
    margin: 0,
    leverage: 0,
    stopLossPct: 0,
    takeProfitPct: 0,
  };
}

/** Reason the patch cannot be applied, or null when it is valid. */
export function validatePatch(patch: PositionPatch): string | null {
  if (patch.coin !== undefined && patch.coin.trim() === "") {
    return "Coin must not be empty.";
  }
  if (patch.margin !== undefined && !(Number.isFinite(patch.margin) && patch.margin >= 0)) {
    return "Margin must be a non-negative number.";
  }
  if (patch.leverage !== undefined && !(Number.isFinite(patch.leverage) && patch.leverage >= 0)) {
    return "Leverage must be a non-negative number.";
  }
  for (const key of ["stopLossPct", "takeProfitPct"] as const) {
    const pct = patch[key];
    if (pct !== undefined && !(Number.isInteger(pct) && pct >= 0 && pct <= 100)) {
      return `${key === "stopLossPct" ? "Stop-loss" : "Take-profit"} must be a whole percentage between 0 and 100.`;
    }
  }
  return null;
}

export function applyPatch(position: Position, patch: PositionPatch): void {
  if (patch.coin !== undefined) {
    position.coin = patch.coin.trim().toUpperCase();
  }
  if (patch.margin !== undefined) {
    position.margin = patch.margin;
  }
  if (patch.leverage !== undefined) {
    position.leverage = patch.leverage;
  }
  if (patch.stopLossPct !== undefined) {
    position.stopLossPct = patch.stopLossPct;
  }
  if (patch.takeProfitPct !== undefined) {
    position.takeProfitPct = patch.takeProfitPct;
  }
}
