import type { ScoringConfig } from "../config";
import { InvariantViolation } from "../domain/errors";
import type { ScoringInput, SignalGroup, SubScore } from "../domain/types";

/**
 * A scorer maps one indicator group to a bounded sub-score. Scorers are
 * pure: same input and config, same SubScore.
 */
export type ScoringStrategy = (
  input: ScoringInput,
  config: ScoringConfig
) => SubScore;

export interface Scorer {
  group: SignalGroup;
  description: string;
  score: ScoringStrategy;
}

/**
 * Helper to define a scorer whose output is range-checked on every call.
 */
export function defineScorer(args: {
  group: SignalGroup;
  description: string;
  score: (
    input: ScoringInput,
    config: ScoringConfig
  ) => Omit<SubScore, "group" | "weight">;
}): Scorer {
  const { group, description } = args;
  return {
    group,
    description,
    score(input, config) {
      const partial = args.score(input, config);
      const subScore: SubScore = {
        group,
        value: partial.value,
        weight: config.weights[group],
        confidence: partial.confidence,
        evidence: partial.evidence,
      };
      assertSubScore(subScore);
      return subScore;
    },
  };
}

export function assertSubScore(subScore: SubScore): void {
  const { group, value, weight } = subScore;
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new InvariantViolation(
      `${group} scorer produced value ${value} outside [0, 100]`
    );
  }
  if (!Number.isFinite(weight) || weight <= 0 || weight > 1) {
    throw new InvariantViolation(
      `${group} scorer produced weight ${weight} outside (0, 1]`
    );
  }
}

export function neutralDefault(
  config: ScoringConfig,
  reason: string
): Omit<SubScore, "group" | "weight"> {
  return {
    value: config.neutralScore,
    confidence: false,
    evidence: [reason],
  };
}
