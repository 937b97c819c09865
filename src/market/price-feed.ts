import { logger } from "../utils/logger.js";
import {
  SUPPORTED_COINS,
  staticCoinTable,
  staticPriceMap,
  syntheticHistory,
} from "./fallback-data.js";
import type {
  CoinTable,
  PriceMap,
  PricePoint,
  PriceSource,
  Result,
} from "./price-source.js";

const SPOT_TTL_MS = 60_000; // 1 minute
const HISTORY_TTL_MS = 300_000; // 5 minutes
const RETRY_AFTER_MS = 30_000;

export const STATIC_SOURCE = "Static";
export const SAMPLE_SOURCE = "Sample";

export interface PriceSnapshot<T> {
  data: T;
  /** Name of the source that produced the data. */
  source: string;
  /** false when the data came from the static table or the synthetic series. */
  live: boolean;
  /** Non-blocking notice for the user when a fallback was used. */
  advisory?: string;
}

export interface PriceFeedOptions {
  useLivePrices?: boolean;
  spotTtlMs?: number;
  historyTtlMs?: number;
  /** How long a fallback answer is reused before the sources are tried again. */
  retryAfterMs?: number;
  now?: () => number;
}

interface CacheEntry<T> {
  value: PriceSnapshot<T>;
  expiresAt: number;
}

export interface Attempt<T> {
  source: string;
  result: Result<T>;
}

/**
 * Pick the first successful attempt, or describe why every one failed.
 * Kept separate from the fetching so the fallback policy is testable on its own.
 */
export function selectFirstOk<T>(
  attempts: Array<Attempt<T>>,
): { source: string; value: T } | { reasons: string[] } {
  const reasons: string[] = [];
  for (const attempt of attempts) {
    if (attempt.result.ok) {
      return { source: attempt.source, value: attempt.result.value };
    }
    reasons.push(`${attempt.source}: ${attempt.result.reason}`);
  }
  return { reasons };
}

/** A price map is usable only if every supported coin has a positive price. */
export function checkCompletePrices(prices: PriceMap): Result<PriceMap> {
  const missing = SUPPORTED_COINS.filter((c) => !((prices[c.coinId] ?? 0) > 0)).map(
    (c) => c.coinId,
  );
  if (missing.length > 0) {
    return { ok: false, reason: `missing or zero price for ${missing.join(", ")}` };
  }
  return { ok: true, value: prices };
}

/**
 * TTL-cached view over an ordered chain of price sources. Sources are tried in
 * order and the first success wins; when all fail, the static table (spot) or
 * a synthetic series (history) is returned with an advisory. Live data is kept
 * for the spot or history TTL, fallbacks only for the shorter retry window.
 */
export class PriceFeed {
  private sources: PriceSource[];
  private useLivePrices: boolean;
  private spotTtlMs: number;
  private historyTtlMs: number;
  private retryAfterMs: number;
  private now: () => number;

  private pricesCache: CacheEntry<PriceMap> | null = null;
  private topCoinsCache = new Map<number, CacheEntry<CoinTable>>();
  private historyCache = new Map<string, CacheEntry<PricePoint[]>>();

  constructor(sources: PriceSource[], opts: PriceFeedOptions = {}) {
    this.sources = sources;
    this.useLivePrices = opts.useLivePrices ?? true;
    this.spotTtlMs = opts.spotTtlMs ?? SPOT_TTL_MS;
    this.historyTtlMs = opts.historyTtlMs ?? HISTORY_TTL_MS;
    this.retryAfterMs = opts.retryAfterMs ?? RETRY_AFTER_MS;
    this.now = opts.now ?? Date.now;
  }

  clearCache(): void {
    this.pricesCache = null;
    this.topCoinsCache.clear();
    this.historyCache.clear();
  }

  setUseLivePrices(useLivePrices: boolean): void {
    if (useLivePrices !== this.useLivePrices) {
      this.useLivePrices = useLivePrices;
      this.clearCache();
    }
  }

  private fresh<T>(entry: CacheEntry<T> | null | undefined): entry is CacheEntry<T> {
    return entry !== null && entry !== undefined && this.now() < entry.expiresAt;
  }

  private entry<T>(value: PriceSnapshot<T>, ttlMs: number): CacheEntry<T> {
    return { value, expiresAt: this.now() + (value.live ? ttlMs : this.retryAfterMs) };
  }

  private async tryAll<T>(
    fetchOne: (source: PriceSource) => Promise<Result<T>>,
    validate: (value: T) => Result<T> = (value) => ({ ok: true, value }),
  ): Promise<{ source: string; value: T } | { reasons: string[] }> {
    if (!this.useLivePrices) {
      return { reasons: ["live prices disabled"] };
    }
    const attempts: Array<Attempt<T>> = [];
    for (const source of this.sources) {
      const raw = await fetchOne(source);
      const result = raw.ok ? validate(raw.value) : raw;
      attempts.push({ source: source.name, result });
      if (result.ok) {
        break;
      }
    }
    return selectFirstOk(attempts);
  }

  private fallbackAdvisory(what: string, reasons: string[]): string | undefined {
    if (!this.useLivePrices) {
      return undefined;
    }
    logger.warn(`[prices] ${what} unavailable, using fallback. ${reasons.join("; ")}`);
    return `Live ${what} unavailable; showing approximate values.`;
  }

  /** coinId → USD price for at least the supported coin set. */
  async getCurrentPrices(): Promise<PriceSnapshot<PriceMap>> {
    if (this.fresh(this.pricesCache)) {
      return this.pricesCache.value;
    }

    const picked = await this.tryAll((s) => s.getCurrentPrices(), checkCompletePrices);
    let snapshot: PriceSnapshot<PriceMap>;
    if ("value" in picked) {
      snapshot = { data: picked.value, source: picked.source, live: true };
    } else {
      const advisory = this.fallbackAdvisory("prices", picked.reasons);
      snapshot = {
        data: staticPriceMap(),
        source: STATIC_SOURCE,
        live: false,
        ...(advisory ? { advisory } : {}),
      };
    }
    this.pricesCache = this.entry(snapshot, this.spotTtlMs);
    return snapshot;
  }

  /** The selectable coin universe, keyed by upper-case symbol. */
  async getTopCoins(limit = 50): Promise<PriceSnapshot<CoinTable>> {
    const cached = this.topCoinsCache.get(limit);
    if (this.fresh(cached)) {
      return cached.value;
    }

    const picked = await this.tryAll((s) => s.getTopCoins(limit));
    let snapshot: PriceSnapshot<CoinTable>;
    if ("value" in picked) {
      snapshot = { data: picked.value, source: picked.source, live: true };
    } else {
      const advisory = this.fallbackAdvisory("coin list", picked.reasons);
      snapshot = {
        data: staticCoinTable(),
        source: STATIC_SOURCE,
        live: false,
        ...(advisory ? { advisory } : {}),
      };
    }
    this.topCoinsCache.set(limit, this.entry(snapshot, this.spotTtlMs));
    return snapshot;
  }

  /**
   * Top coins merged with the supported coin set, so that positions on a
   * supported coin outside the top list can still be priced. Top-list entries
   * win on conflicts.
   */
  async getCoinTable(limit = 50): Promise<PriceSnapshot<CoinTable>> {
    const top = await this.getTopCoins(limit);
    const spot = await this.getCurrentPrices();

    const table: CoinTable = {};
    for (const coin of SUPPORTED_COINS) {
      const price = spot.data[coin.coinId];
      if (price !== undefined && price > 0) {
        table[coin.symbol] = { coinId: coin.coinId, price };
      }
    }
    Object.assign(table, top.data);

    const advisories = [top.advisory, spot.advisory].filter((a): a is string => Boolean(a));
    const uniqueAdvisories = [...new Set(advisories)];
    return {
      data: table,
      source: top.source,
      live: top.live && spot.live,
      ...(uniqueAdvisories.length > 0 ? { advisory: uniqueAdvisories.join(" ") } : {}),
    };
  }

  /** Daily history for one coin, oldest first. */
  async getHistory(coinId: string, days = 7): Promise<PriceSnapshot<PricePoint[]>> {
    const key = `${coinId}:${days}`;
    const cached = this.historyCache.get(key);
    if (this.fresh(cached)) {
      return cached.value;
    }

    const picked = await this.tryAll((s) => s.getHistory(coinId, days));
    let snapshot: PriceSnapshot<PricePoint[]>;
    if ("value" in picked) {
      snapshot = { data: picked.value, source: picked.source, live: true };
    } else {
      const advisory = this.fallbackAdvisory(`history for ${coinId}`, picked.reasons);
      snapshot = {
        data: syntheticHistory(coinId, days, this.now()),
        source: SAMPLE_SOURCE,
        live: false,
        ...(advisory ? { advisory } : {}),
      };
    }
    this.historyCache.set(key, this.entry(snapshot, this.historyTtlMs));
    return snapshot;
  }
}
