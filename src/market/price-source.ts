export type Result<T> = { ok: true; value: T } | { ok: false; reason: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(reason: string): Result<T> {
  return { ok: false, reason };
}

/** coinId → USD price */
export type PriceMap = Record<string, number>;

export interface CoinQuote {
  coinId: string;
  price: number;
  rank?: number;
}

/** Upper-case symbol → quote */
export type CoinTable = Record<string, CoinQuote>;

export interface PricePoint {
  /** ISO 8601 */
  timestamp: string;
  price: number;
}

/**
 * A provider of spot prices and short price history.
 * Implementations never throw: transport and parse failures come back as `err`.
 */
export interface PriceSource {
  readonly name: string;
  getCurrentPrices(): Promise<Result<PriceMap>>;
  getTopCoins(limit: number): Promise<Result<CoinTable>>;
  getHistory(coinId: string, days: number): Promise<Result<PricePoint[]>>;
}
