import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { SUPPORTED_COIN_IDS } from "./fallback-data.js";
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

const COINGECKO_BASE = "https://api.coingecko.com/api/v3";

const SimplePriceSchema = Type.Record(Type.String(), Type.Object({ usd: Type.Number() }));

const MarketsSchema = Type.Array(
  Type.Object({
    id: Type.String(),
    symbol: Type.String(),
    current_price: Type.Number(),
    market_cap_rank: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
  }),
);

const MarketChartSchema = Type.Object({
  prices: Type.Array(Type.Tuple([Type.Number(), Type.Number()])),
});

/**
 * CoinGecko public API. Spot prices are requested for the supported coin set
 * only; the top-coin list comes from /coins/markets ordered by market cap.
 */
export class CoinGeckoSource implements PriceSource {
  readonly name = "CoinGecko";
  private http: HttpOptions;
  private coinIds: readonly string[];

  constructor(http: HttpOptions = {}, coinIds: readonly string[] = SUPPORTED_COIN_IDS) {
    this.http = http;
    this.coinIds = coinIds;
  }

  async getCurrentPrices(): Promise<Result<PriceMap>> {
    const params = new URLSearchParams({ ids: this.coinIds.join(","), vs_currencies: "usd" });
    const res = await getJson(`${COINGECKO_BASE}/simple/price?${params}`, this.http);
    if (!res.ok) {
      return res;
    }
    if (!Value.Check(SimplePriceSchema, res.value)) {
      return err("CoinGecko returned an unexpected price payload");
    }
    const prices: PriceMap = {};
    for (const [id, quote] of Object.entries(res.value)) {
      prices[id] = quote.usd;
    }
    return ok(prices);
  }

  async getTopCoins(limit: number): Promise<Result<CoinTable>> {
    const params = new URLSearchParams({
      vs_currency: "usd",
      order: "market_cap_desc",
      per_page: String(limit),
      page: "1",
    });
    const res = await getJson(`${COINGECKO_BASE}/coins/markets?${params}`, this.http);
    if (!res.ok) {
      return res;
    }
    if (!Value.Check(MarketsSchema, res.value)) {
      return err("CoinGecko returned an unexpected markets payload");
    }
    const table: CoinTable = {};
    res.value.forEach((coin, idx) => {
      const symbol = coin.symbol.toUpperCase();
      if (coin.current_price > 0 && !(symbol in table)) {
        table[symbol] = {
          coinId: coin.id,
          price: coin.current_price,
          rank: coin.market_cap_rank ?? idx + 1,
        };
      }
    });
    if (Object.keys(table).length === 0) {
      return err("CoinGecko returned no priced coins");
    }
    return ok(table);
  }

  async getHistory(coinId: string, days: number): Promise<Result<PricePoint[]>> {
    const params = new URLSearchParams({
      vs_currency: "usd",
      days: String(days),
      interval: "daily",
    });
    const url = `${COINGECKO_BASE}/coins/${encodeURIComponent(coinId)}/market_chart?${params}`;
    const res = await getJson(url, this.http);
    if (!res.ok) {
      return res;
    }
    if (!Value.Check(MarketChartSchema, res.value) || res.value.prices.length === 0) {
      return err(`CoinGecko returned no history for ${coinId}`);
    }
    const points = res.value.prices
      .toSorted((a, b) => a[0] - b[0])
      .map(([time, price]) => ({ timestamp: new Date(time).toISOString(), price }));
    return ok(points);
  }
}
