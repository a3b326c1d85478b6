export * from "./base";
export * from "./momentum";
export * from "./risk";
export * from "./sentiment";
export * from "./valuation";

import type { ScoringConfig } from "../config";
import type { ScoringInput, SignalGroup, SubScore } from "../domain/types";
import type { Scorer } from "./base";
import { MomentumScorer } from "./momentum";
import { RiskScorer } from "./risk";
import { SentimentScorer } from "./sentiment";
import { ValuationScorer } from "./valuation";

export const SCORER_REGISTRY: Record<SignalGroup, Scorer> = {
  valuation: ValuationScorer,
  momentum: MomentumScorer,
  sentiment: SentimentScorer,
  risk: RiskScorer,
};

/**
 * Scorers enabled by the config, in config order.
 */
export function getScorers(config: ScoringConfig): Scorer[] {
  return config.groups.map(group => SCORER_REGISTRY[group]);
}

/**
 * Runs every scorer as its own task and resolves once all have finished.
 * Scorers share nothing, so order of completion does not matter; results
 * keep the order of `scorers`.
 */
export async function runScorers(
  input: ScoringInput,
  config: ScoringConfig,
  scorers: Scorer[] = getScorers(config)
): Promise<SubScore[]> {
  return Promise.all(
    scorers.map(async scorer => scorer.score(input, config))
  );
}
