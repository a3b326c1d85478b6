import type { PriceHistoryStats } from "./domain/types";

const TRADING_DAYS_PER_YEAR = 252;

/**
 * Summary statistics over a series of daily closes, oldest first.
 * Returns null when fewer than two closes are available.
 */
export function computeHistoryStats(closes: number[]): PriceHistoryStats | null {
  if (closes.length < 2) return null;

  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    returns.push(closes[i] / closes[i - 1] - 1);
  }

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance =
    returns.length > 1
      ? returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) /
        (returns.length - 1)
      : 0;

  let peak = closes[0];
  let maxDrawdown = 0;
  for (const close of closes) {
    if (close > peak) peak = close;
    const drawdown = (close - peak) / peak;
    if (drawdown < maxDrawdown) maxDrawdown = drawdown;
  }

  return {
    sessions: closes.length,
    annualizedReturn: Math.pow(1 + mean, TRADING_DAYS_PER_YEAR) - 1,
    annualizedVolatility: Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR),
    maxDrawdown,
  };
}
