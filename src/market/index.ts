export { PriceFeed, selectFirstOk, checkCompletePrices, STATIC_SOURCE, SAMPLE_SOURCE } from "./price-feed.js";
export type { PriceSnapshot, PriceFeedOptions, Attempt } from "./price-feed.js";
export { CoinPaprikaSource } from "./coinpaprika-source.js";
export { CoinGeckoSource } from "./coingecko-source.js";
export { getJson, DEFAULT_TIMEOUT_MS } from "./http.js";
export type { FetchFn, HttpOptions } from "./http.js";
export { ok, err } from "./price-source.js";
export type {
  Result,
  PriceMap,
  CoinQuote,
  CoinTable,
  PricePoint,
  PriceSource,
} from "./price-source.js";
export {
  SUPPORTED_COINS,
  SUPPORTED_COIN_IDS,
  staticCoinTable,
  staticPriceMap,
  syntheticHistory,
} from "./fallback-data.js";
export type { SupportedCoin } from "./fallback-data.js";

import type { HttpOptions } from "./http.js";
import { CoinGeckoSource } from "./coingecko-source.js";
import { CoinPaprikaSource } from "./coinpaprika-source.js";
import { PriceFeed } from "./price-feed.js";

/** CoinPaprika first, CoinGecko as the second live source. */
export function createPriceFeed(opts: { useLivePrices: boolean; http?: HttpOptions }): PriceFeed {
  const http = opts.http ?? {};
  return new PriceFeed([new CoinPaprikaSource(http), new CoinGeckoSource(http)], {
    useLivePrices: opts.useLivePrices,
  });
}
