import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { getJson, type HttpOptions } from "./http.js";
import {
  err,
  ok,
  type CoinTable,
  type PriceMap,
  type PricePoint,
  type PriceSource,
  type Result,
} from "./price-source.js";

const COINPAPRIKA_BASE = "https://api.coinpaprika.com";
const DAY_MS = 24 * 60 * 60 * 1000;
// Top coins and spot prices come from the same payload; one download serves both.
const TICKERS_SHARE_MS = 10_000;

const TickerSchema = Type.Object({
  id: Type.String(),
  symbol: Type.String(),
  rank: Type.Number(),
  quotes: Type.Object({
    USD: Type.Object({ price: Type.Number() }),
  }),
});

const TickersSchema = Type.Array(TickerSchema);

type Tickers = Static<typeof TickersSchema>;

const HistoricalSchema = Type.Array(
  Type.Object({
    timestamp: Type.String(),
    price: Type.Number(),
  }),
);

function isoSeconds(ms: number): string {
  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Spot tickers and daily history from the CoinPaprika public API. */
export class CoinPaprikaSource implements PriceSource {
  readonly name = "CoinPaprika";
  private http: HttpOptions;
  private now: () => number;
  private tickers: { fetchedAt: number; result: Promise<Result<Tickers>> } | null = null;

  constructor(http: HttpOptions = {}, now: () => number = Date.now) {
    this.http = http;
    this.now = now;
  }

  private fetchTickers(): Promise<Result<Tickers>> {
    const now = this.now();
    if (this.tickers && now - this.tickers.fetchedAt < TICKERS_SHARE_MS) {
      return this.tickers.result;
    }
    const result = this.loadTickers();
    this.tickers = { fetchedAt: now, result };
    return result;
  }

  private async loadTickers(): Promise<Result<Tickers>> {
    const res = await getJson(`${COINPAPRIKA_BASE}/v1/tickers`, this.http);
    if (!res.ok) {
      return res;
    }
    if (!Value.Check(TickersSchema, res.value)) {
      return err("CoinPaprika returned an unexpected tickers payload");
    }
    return ok(res.value);
  }

  async getCurrentPrices(): Promise<Result<PriceMap>> {
    const tickers = await this.fetchTickers();
    if (!tickers.ok) {
      return tickers;
    }
    const prices: PriceMap = {};
    for (const t of tickers.value) {
      prices[t.id] = t.quotes.USD.price;
    }
    return ok(prices);
  }

  async getTopCoins(limit: number): Promise<Result<CoinTable>> {
    const tickers = await this.fetchTickers();
    if (!tickers.ok) {
      return tickers;
    }
    const table: CoinTable = {};
    const ranked = tickers.value
      .filter((t) => t.quotes.USD.price > 0)
      .toSorted((a, b) => (a.rank || 9999) - (b.rank || 9999))
      .slice(0, limit);
    for (const t of ranked) {
      const symbol = t.symbol.toUpperCase();
      if (!(symbol in table)) {
        table[symbol] = { coinId: t.id, price: t.quotes.USD.price, rank: t.rank };
      }
    }
    if (Object.keys(table).length === 0) {
      return err("CoinPaprika returned no priced coins");
    }
    return ok(table);
  }

  async getHistory(coinId: string, days: number): Promise<Result<PricePoint[]>> {
    const end = this.now();
    const start = end - days * DAY_MS;
    const params = new URLSearchParams({
      start: isoSeconds(start),
      end: isoSeconds(end),
      interval: "24h",
    });
    const url = `${COINPAPRIKA_BASE}/v1/tickers/${encodeURIComponent(coinId)}/historical?${params}`;
    const res = await getJson(url, this.http);
    if (!res.ok) {
      return res;
    }
    if (!Value.Check(HistoricalSchema, res.value) || res.value.length === 0) {
      return err(`CoinPaprika returned no history for ${coinId}`);
    }
    const points = res.value
      .map((p) => ({ time: Date.parse(p.timestamp), price: p.price }))
      .filter((p) => !Number.isNaN(p.time))
      .toSorted((a, b) => a.time - b.time)
      .map((p) => ({ timestamp: new Date(p.time).toISOString(), price: p.price }));
    return ok(points);
  }
}
