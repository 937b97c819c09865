import type { CoinTable, PriceMap, PricePoint } from "./price-source.js";

export interface SupportedCoin {
  symbol: string;
  coinId: string;
  /** Last-known approximate USD price. */
  price: number;
}

export const SUPPORTED_COINS: readonly SupportedCoin[] = [
  { symbol: "BTC", coinId: "bitcoin", price: 67_000 },
  { symbol: "ETH", coinId: "ethereum", price: 3_500 },
  { symbol: "SOL", coinId: "solana", price: 150 },
  { symbol: "ADA", coinId: "cardano", price: 0.45 },
  { symbol: "SUI", coinId: "sui", price: 1.5 },
  { symbol: "LINK", coinId: "chainlink", price: 14 },
  { symbol: "PEPE", coinId: "pepe", price: 0.000012 },
  { symbol: "AAVE", coinId: "aave", price: 150 },
  { symbol: "ONDO", coinId: "ondo-finance", price: 1 },
  { symbol: "PAAL", coinId: "paal-ai", price: 0.1 },
];

export const SUPPORTED_COIN_IDS: readonly string[] = SUPPORTED_COINS.map((c) => c.coinId);

const DAY_MS = 24 * 60 * 60 * 1000;

export function staticPriceMap(): PriceMap {
  const prices: PriceMap = {};
  for (const coin of SUPPORTED_COINS) {
    prices[coin.coinId] = coin.price;
  }
  return prices;
}

export function staticCoinTable(): CoinTable {
  const table: CoinTable = {};
  SUPPORTED_COINS.forEach((coin, idx) => {
    table[coin.symbol] = { coinId: coin.coinId, price: coin.price, rank: idx + 1 };
  });
  return table;
}

/**
 * Deterministic stand-in for a price history: one point per day going back
 * from `now`, oscillating ±5% around the coin's static price (1 when unknown).
 * Returned oldest first.
 */
export function syntheticHistory(coinId: string, days: number, now: number): PricePoint[] {
  const base = SUPPORTED_COINS.find((c) => c.coinId === coinId)?.price ?? 1;
  const points: PricePoint[] = [];
  for (let i = 0; i < days; i++) {
    points.push({
      timestamp: new Date(now - i * DAY_MS).toISOString(),
      price: base * (1 + 0.05 * Math.sin(i)),
    });
  }
  return points.toReversed();
}
