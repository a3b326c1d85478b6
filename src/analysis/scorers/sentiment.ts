import type { Polarity, SentimentSignal } from "../domain/types";
import { defineScorer, neutralDefault } from "./base";

export const POLARITY_VALUE: Record<Polarity, number> = {
  bullish: 1,
  neutral: 0,
  bearish: -1,
};

export function countPolarities(
  signals: SentimentSignal[]
): Record<Polarity, number> {
  const counts: Record<Polarity, number> = { bullish: 0, neutral: 0, bearish: 0 };
  for (const signal of signals) counts[signal.polarity] += 1;
  return counts;
}

/**
 * Sentiment: mean polarity across sources, mapped from [-1, 1] to [0, 100].
 */
export const SentimentScorer = defineScorer({
  group: "sentiment",
  description: "Mean polarity of news and analyst signals",
  score({ signals }, config) {
    if (signals.length === 0) {
      return neutralDefault(config, "no sentiment signals");
    }
    const net =
      signals.reduce((sum, s) => sum + POLARITY_VALUE[s.polarity], 0) /
      signals.length;
    const counts = countPolarities(signals);
    return {
      value: (net + 1) * 50,
      confidence: true,
      evidence: [
        `${counts.bullish} bullish, ${counts.neutral} neutral, ${counts.bearish} bearish across ${signals.length} sources`,
      ],
    };
  },
});
