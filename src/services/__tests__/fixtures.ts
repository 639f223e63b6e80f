/**
 * Shared test data: two small stress scenarios, a category table and price
 * series built so each holding's co-movement with REF is known in advance.
 */

import { parseReferenceData, type ReferenceData } from "../reference-data.ts";
import { createPortfolioSnapshot, type PortfolioSnapshot } from "../portfolio.ts";
import type { PricePoint } from "../../schemas/reference-data.ts";

export const REFERENCE_SYMBOL = "REF";

/** Four daily returns of REF; the window under test is 4 days. */
const REF_RETURNS = [0.02, -0.02, 0.02, -0.02];
/** Zero-mean and orthogonal to REF_RETURNS, same length. */
const NOISE_RETURNS = [0.02, 0.02, -0.02, -0.02];

export const WINDOW_DAYS = 4;

export function pricesFromReturns(returns: readonly number[], start = 100): PricePoint[] {
  const points: PricePoint[] = [{ date: "2026-03-01", price: start }];
  returns.forEach((ret, index) => {
    const previous = points[index].price;
    points.push({ date: `2026-03-0${index + 2}`, price: previous * (1 + ret) });
  });
  return points;
}

/**
 * Price series whose co-movement with REF is 1 / sqrt(1 + noise²):
 * 0 → 100%, 0.43 → 92%, 0.5 → 89%, 0.57 → 87%, 0.6 → 86%, 0.62 → 85%,
 * 0.65 → 84%, 0.67 → 83%, 1.1 → 67%.
 */
export function seriesWithNoise(noise: number): PricePoint[] {
  return pricesFromReturns(REF_RETURNS.map((r, i) => r + noise * NOISE_RETURNS[i]));
}

export const SCENARIOS = [
  {
    scenarioId: "scn-a",
    displayName: "Test Crash A",
    periodLabel: "Period A",
    referenceDrawdownPct: -60,
    marketAvgLossPct: -50,
    bracketLosses: { High: -70, Moderate: -55, Low: -35 },
    categoryLosses: { Alpha: -80, Beta: -40 },
    jointLosses: [{ bracket: "High", category: "Alpha", lossPct: -90 }],
    recoveryWinners: ["B1"],
    recoveryPeriodLabel: "Recovery A",
    opportunityCosts: [
      { category: "Beta", bestPerformer: "B1", recoveryGainPct: 120, reason: "Beta led the rebound." },
    ],
  },
  {
    scenarioId: "scn-b",
    displayName: "Test Crash B",
    periodLabel: "Period B",
    referenceDrawdownPct: -40,
    marketAvgLossPct: -30,
    bracketLosses: { High: -50, Moderate: -38, Low: -20 },
    categoryLosses: { Alpha: -60 },
    jointLosses: [{ bracket: "High", category: "Alpha", lossPct: -75 }],
    recoveryWinners: [],
    recoveryPeriodLabel: "Recovery B",
    opportunityCosts: [
      { category: "Gamma", bestPerformer: "G1", recoveryGainPct: 150.25, reason: "" },
      { category: "Alpha", bestPerformer: "A1", recoveryGainPct: 300, reason: "Alpha recovered first." },
    ],
  },
];

export const CATEGORIES: Record<string, string> = {
  A1: "Alpha",
  A2: "Alpha",
  A3: "Alpha",
  A4: "Alpha",
  A5: "Alpha",
  A6: "Alpha",
  A7: "Alpha",
  A8: "Alpha",
  A9: "Alpha",
  B1: "Beta",
  G1: "Gamma",
  D1: "Delta",
  E1: "Epsilon",
};

/**
 * Every mapped symbol shares one series, so any mix of them has exactly
 * that series' co-movement with REF.
 */
export function makeReference(noise: number, extraPrices: Record<string, PricePoint[]> = {}): ReferenceData {
  const shared = seriesWithNoise(noise);
  const prices: Record<string, PricePoint[]> = { [REFERENCE_SYMBOL]: pricesFromReturns(REF_RETURNS) };
  for (const symbol of Object.keys(CATEGORIES)) prices[symbol] = shared;
  return parseReferenceData({
    scenarios: SCENARIOS,
    categories: CATEGORIES,
    prices: { ...prices, ...extraPrices },
  });
}

export function makeSnapshot(values: Record<string, number>, ownerId = "owner-1"): PortfolioSnapshot {
  return createPortfolioSnapshot({
    ownerId,
    holdings: Object.entries(values).map(([symbol, unitPrice]) => ({
      symbol,
      quantity: 1,
      unitPrice,
    })),
    snapshotTime: "2026-03-06T00:00:00.000Z",
  });
}

/** Nine Alpha holdings worth 68 of 100, Beta the rest. */
export const ALPHA_HEAVY = {
  A1: 8,
  A2: 8,
  A3: 8,
  A4: 8,
  A5: 8,
  A6: 8,
  A7: 8,
  A8: 8,
  A9: 4,
  B1: 32,
};

/** Four categories at 25% each. */
export const EVEN_FOUR = { A1: 25, B1: 25, G1: 25, D1: 25 };

/** Five categories, the largest at 21%. */
export const EVEN_FIVE = { A1: 21, B1: 21, G1: 20, D1: 19, E1: 19 };
