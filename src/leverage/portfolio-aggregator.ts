import type { PositionValuation } from "./position.js";

export const DEFAULT_FUNDING_RATE = 0.0002; // per 8h
const TOP_N = 3;

export type RiskLevel = "Low" | "Medium" | "High";

export interface RiskAssessment {
  level: RiskLevel;
  rationale: string;
  leverageRatio: number;
  /** Mean of the stop-loss percentages that are set; null when none is. */
  avgStopLossPct: number | null;
}

export interface CoinExposure {
  coin: string;
  exposure: number;
  percent: number;
}

export interface Concentration {
  top: CoinExposure[];
  /** 100 minus the top percentages; present only when more coins exist. */
  othersPercent?: number;
}

export interface PortfolioSummary {
  positionCount: number;
  totalMargin: number;
  totalExposure: number;
  weightedLeverage: number;
  exposureByCoin: Record<string, number>;
  /** Sorted by exposure, largest first. */
  exposureBreakdown: CoinExposure[];
  concentration: Concentration;
  fundingRate: number;
  fundingFeeEstimate: number;
  risk?: RiskAssessment;
}

/** Funding paid per period on the full exposure. */
export function fundingFee(totalExposure: number, rate = DEFAULT_FUNDING_RATE): number {
  return totalExposure * rate;
}

export function groupExposureByCoin(valuations: readonly PositionValuation[]): Record<string, number> {
  const byCoin: Record<string, number> = {};
  for (const v of valuations) {
    byCoin[v.coin] = (byCoin[v.coin] ?? 0) + v.positionSizeUsd;
  }
  return byCoin;
}

export function exposureBreakdown(exposureByCoin: Record<string, number>): CoinExposure[] {
  const total = Object.values(exposureByCoin).reduce((sum, x) => sum + x, 0);
  if (total <= 0) {
    return [];
  }
  return Object.entries(exposureByCoin)
    .map(([coin, exposure]) => ({ coin, exposure, percent: (100 * exposure) / total }))
    .toSorted((a, b) => b.exposure - a.exposure);
}

export function concentration(breakdown: readonly CoinExposure[]): Concentration {
  const top = breakdown.slice(0, TOP_N);
  if (breakdown.length <= TOP_N) {
    return { top };
  }
  const topPercent = top.reduce((sum, c) => sum + c.percent, 0);
  return { top, othersPercent: 100 - topPercent };
}

/** "BTC 62.5%, ETH 25.0%, SOL 8.3%, Others 4.2%" */
export function formatConcentration(c: Concentration): string {
  if (c.top.length === 0) {
    return "No exposure";
  }
  const parts = c.top.map((e) => `${e.coin} ${e.percent.toFixed(1)}%`);
  if (c.othersPercent !== undefined) {
    parts.push(`Others ${c.othersPercent.toFixed(1)}%`);
  }
  return parts.join(", ");
}

/**
 * Qualitative risk from overall leverage and average stop-loss width.
 * Conditions overlap, so they are checked in order: Low, then Medium, else High.
 *
 *   no stop-loss anywhere          → High
 *   ratio ≤ 2 and avg stop ≤ 5%    → Low
 *   ratio ≤ 3 or  avg stop ≤ 10%   → Medium
 *   otherwise                      → High
 */
export function assessRisk(
  totalExposure: number,
  totalMargin: number,
  stopLossPcts: readonly number[],
): RiskAssessment {
  const leverageRatio = totalMargin > 0 ? totalExposure / totalMargin : Number.POSITIVE_INFINITY;
  const setStops = stopLossPcts.filter((pct) => pct > 0);
  const avgStopLossPct =
    setStops.length > 0 ? setStops.reduce((sum, pct) => sum + pct, 0) / setStops.length : null;

  if (avgStopLossPct === null) {
    return {
      level: "High",
      rationale: "No stop-loss set on any position.",
      leverageRatio,
      avgStopLossPct,
    };
  }

  const ratioText = `${leverageRatio.toFixed(2)}x`;
  const stopText = `${avgStopLossPct.toFixed(1)}%`;

  if (leverageRatio <= 2 && avgStopLossPct <= 5) {
    return {
      level: "Low",
      rationale: `Overall leverage ${ratioText} with tight stops (avg ${stopText}).`,
      leverageRatio,
      avgStopLossPct,
    };
  }
  if (leverageRatio <= 3 || avgStopLossPct <= 10) {
    return {
      level: "Medium",
      rationale: `Overall leverage ${ratioText} with average stop-loss ${stopText}.`,
      leverageRatio,
      avgStopLossPct,
    };
  }
  return {
    level: "High",
    rationale: `Overall leverage ${ratioText} with wide stops (avg ${stopText}).`,
    leverageRatio,
    avgStopLossPct,
  };
}

/** Reduce valuations (non-inert positions only) to portfolio totals. */
export function aggregate(
  valuations: readonly PositionValuation[],
  opts: { fundingRate?: number } = {},
): PortfolioSummary {
  const fundingRate = opts.fundingRate ?? DEFAULT_FUNDING_RATE;

  let totalMargin = 0;
  let totalExposure = 0;
  for (const v of valuations) {
    totalMargin += v.margin;
    totalExposure += v.positionSizeUsd;
  }

  const exposureByCoin = groupExposureByCoin(valuations);
  const breakdown = exposureBreakdown(exposureByCoin);

  return {
    positionCount: valuations.length,
    totalMargin,
    totalExposure,
    weightedLeverage: totalMargin > 0 ? totalExposure / totalMargin : 0,
    exposureByCoin,
    exposureBreakdown: breakdown,
    concentration: concentration(breakdown),
    fundingRate,
    fundingFeeEstimate: fundingFee(totalExposure, fundingRate),
    ...(valuations.length > 0
      ? {
          risk: assessRisk(
            totalExposure,
            totalMargin,
            valuations.map((v) => v.stopLossPct),
          ),
        }
      : {}),
  };
}
