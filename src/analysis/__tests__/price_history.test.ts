import { computeHistoryStats } from "../price_history";

describe("computeHistoryStats", () => {
  it("needs at least two closes", () => {
    expect(computeHistoryStats([])).toBeNull();
    expect(computeHistoryStats([100])).toBeNull();
  });

  it("annualizes daily returns on a 252-session year", () => {
    const stats = computeHistoryStats([100, 110, 99]);

    expect(stats?.sessions).toBe(3);
    // +10% then -10%: mean daily return is zero
    expect(stats?.annualizedReturn).toBeCloseTo(0, 10);
    // sample std of [0.1, -0.1] is sqrt(0.02)
    expect(stats?.annualizedVolatility).toBeCloseTo(Math.sqrt(0.02 * 252), 10);
    expect(stats?.maxDrawdown).toBeCloseTo(-0.1, 10);
  });

  it("reports zero volatility and drawdown for a single rising step", () => {
    const stats = computeHistoryStats([50, 55]);

    expect(stats?.annualizedVolatility).toBe(0);
    expect(stats?.maxDrawdown).toBe(0);
    expect(stats?.annualizedReturn).toBeCloseTo(Math.pow(1.1, 252) - 1, 0);
  });

  it("measures drawdown from the running peak", () => {
    const stats = computeHistoryStats([100, 80, 120, 60, 90]);
    expect(stats?.maxDrawdown).toBeCloseTo(-0.5, 10);
  });
});
