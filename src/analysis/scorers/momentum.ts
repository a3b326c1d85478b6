import { clamp } from "../../util/numbers";
import { defineScorer, neutralDefault } from "./base";

interface Component {
  score: number;
  weight: number;
}

/**
 * Momentum: position within the 52-week range, blended with moving-average
 * trend checks and an RSI cue when those are present.
 */
export const MomentumScorer = defineScorer({
  group: "momentum",
  description: "52-week range position with moving-average and RSI cues",
  score({ indicators }, config) {
    const { price, fiftyTwoWeekLow: low, fiftyTwoWeekHigh: high } = indicators;
    if (low == null || high == null) {
      return neutralDefault(config, "52-week range unavailable");
    }
    if (high - low <= 0) {
      return neutralDefault(config, "52-week range has zero width");
    }

    const { blend, rsiOverbought } = config.momentum;
    const rangeScore = clamp((price - low) / (high - low), 0, 1) * 100;
    const components: Component[] = [{ score: rangeScore, weight: blend.range }];
    const evidence = [
      `price ${price} sits at ${rangeScore.toFixed(1)}% of the 52-week range ${low}-${high}`,
    ];

    const { ma50, ma200 } = indicators.movingAverages;
    const checks: boolean[] = [];
    if (ma50 != null) checks.push(price > ma50);
    if (ma200 != null) checks.push(price > ma200);
    if (ma50 != null && ma200 != null) checks.push(ma50 > ma200);
    if (checks.length > 0) {
      const passed = checks.filter(Boolean).length;
      components.push({
        score: (passed / checks.length) * 100,
        weight: blend.trend,
      });
      evidence.push(`${passed}/${checks.length} moving-average trend checks pass`);
    }

    const rsi = indicators.rsi;
    if (rsi != null) {
      // Overbought readings fade rather than keep adding momentum
      const rsiScore =
        rsi > rsiOverbought ? Math.max(0, 2 * rsiOverbought - rsi) : rsi;
      components.push({ score: rsiScore, weight: blend.rsi });
      evidence.push(
        rsi > rsiOverbought
          ? `RSI ${rsi} is overbought`
          : `RSI ${rsi}`
      );
    }

    const totalWeight = components.reduce((sum, c) => sum + c.weight, 0);
    const value =
      totalWeight > 0
        ? components.reduce((sum, c) => sum + c.score * c.weight, 0) /
          totalWeight
        : rangeScore;

    return { value: clamp(value, 0, 100), confidence: true, evidence };
  },
});
