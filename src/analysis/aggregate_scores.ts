import { roundTo } from "../util/numbers";
import type { ScoringConfig } from "./config";
import { InsufficientDataError } from "./domain/errors";
import type { CompositeScore, SubScore } from "./domain/types";
import { assertSubScore } from "./scorers/base";

/**
 * Weight a sub-score carries in the composite. Defaulted sub-scores keep a
 * reduced share instead of dropping out.
 */
export function effectiveWeight(subScore: SubScore, config: ScoringConfig): number {
  return subScore.confidence
    ? subScore.weight
    : subScore.weight * config.missingDataWeightFactor;
}

/**
 * Weighted mean of the sub-scores, rounded to one decimal. The unrounded mean
 * is kept as `rawValue` for category mapping.
 */
export function aggregateScores(
  subScores: SubScore[],
  config: ScoringConfig
): CompositeScore {
  subScores.forEach(assertSubScore);

  let weighted = 0;
  let weightSum = 0;
  for (const subScore of subScores) {
    const w = effectiveWeight(subScore, config);
    weighted += subScore.value * w;
    weightSum += w;
  }

  if (weightSum <= 0) {
    throw new InsufficientDataError(
      subScores.length === 0
        ? "no sub-scores to aggregate"
        : "every sub-score has zero effective weight"
    );
  }

  const mean = weighted / weightSum;
  return {
    value: roundTo(mean, 1),
    rawValue: mean,
    subScores: subScores.map(s => ({ ...s, evidence: [...s.evidence] })),
    effectiveWeightSum: weightSum,
  };
}
