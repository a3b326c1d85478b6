/**
 * Recommendation Mapper: composite score to one of five categories, then the
 * override rule table, which can only move a result down.
 */
import { effectiveWeight } from "./aggregate_scores";
import type { OverrideRule, ScoringConfig } from "./config";
import {
  RECOMMENDATION_CATEGORIES,
  type CompositeScore,
  type Recommendation,
  type RecommendationCategory,
  type SubScore,
} from "./domain/types";

// Absorbs binary noise such as 79.99999999999999 for a true 80
const SCORE_TOLERANCE = 1e-9;

export interface FiredRule {
  rule: OverrideRule;
  subScore: SubScore;
}

/**
 * Thresholds are closed on the lower bound: a score equal to a category's
 * `min` belongs to that category.
 */
export function mapScoreToCategory(
  score: number,
  config: ScoringConfig
): RecommendationCategory {
  for (const threshold of config.thresholds) {
    if (score >= threshold.min) return threshold.category;
  }
  return RECOMMENDATION_CATEGORIES[0];
}

/**
 * Category of a composite. A mean rounded up onto a threshold stays in the
 * lower category: 64.96 displays as 65.0 and maps to Hold.
 */
export function mapCompositeToCategory(
  composite: Pick<CompositeScore, "value" | "rawValue">,
  config: ScoringConfig
): RecommendationCategory {
  return mapScoreToCategory(
    Math.min(composite.value, composite.rawValue + SCORE_TOLERANCE),
    config
  );
}

export function downgrade(category: RecommendationCategory): RecommendationCategory {
  const index = RECOMMENDATION_CATEGORIES.indexOf(category);
  return RECOMMENDATION_CATEGORIES[Math.max(0, index - 1)];
}

export function evaluateOverrideRules(
  subScores: SubScore[],
  rules: OverrideRule[]
): FiredRule[] {
  const fired: FiredRule[] = [];
  for (const rule of rules) {
    const match = subScores.find(
      s => s.group === rule.group && s.value < rule.below
    );
    if (match) fired.push({ rule, subScore: match });
  }
  return fired;
}

/**
 * Sub-scores ordered by weighted contribution, largest first. Ties keep
 * input order.
 */
export function rankContributions(
  subScores: SubScore[],
  config: ScoringConfig
): Array<{ subScore: SubScore; contribution: number }> {
  return subScores
    .map((subScore, index) => ({
      subScore,
      index,
      contribution: subScore.value * effectiveWeight(subScore, config),
    }))
    .sort(
      (a, b) =>
        Math.abs(b.contribution) - Math.abs(a.contribution) || a.index - b.index
    )
    .map(({ subScore, contribution }) => ({ subScore, contribution }));
}

export function mapRecommendation(
  composite: CompositeScore,
  config: ScoringConfig
): Recommendation {
  const baseCategory = mapCompositeToCategory(composite, config);
  const fired = evaluateOverrideRules(composite.subScores, config.overrideRules);
  // Any number of fired rules moves the result down exactly one category
  const category = fired.length > 0 ? downgrade(baseCategory) : baseCategory;

  return {
    category,
    baseCategory,
    score: composite.value,
    rationale: buildRationale(category, baseCategory, composite, fired, config),
    appliedRules: fired.map(f => f.rule.id),
  };
}

/**
 * Stand-in used when no composite could be computed.
 */
export function noRatingRecommendation(
  reason: string,
  config: ScoringConfig
): Recommendation {
  return {
    category: "Hold",
    baseCategory: "Hold",
    score: config.neutralScore,
    rationale: `No rating: ${reason}`,
    appliedRules: [],
  };
}

function describeSubScore(subScore: SubScore): string {
  const suffix = subScore.confidence ? "" : " (defaulted)";
  return `${subScore.group} ${subScore.value.toFixed(1)}${suffix}`;
}

function buildRationale(
  category: RecommendationCategory,
  baseCategory: RecommendationCategory,
  composite: CompositeScore,
  fired: FiredRule[],
  config: ScoringConfig
): string {
  const top = rankContributions(composite.subScores, config)
    .slice(0, 2)
    .map(entry => describeSubScore(entry.subScore));

  let text = `${category} at composite ${composite.value.toFixed(1)}`;
  text += top.length > 0 ? `; led by ${top.join(" and ")}` : "";

  if (fired.length > 0) {
    const reasons = fired
      .map(
        f =>
          `${f.rule.id} (${f.subScore.group} ${f.subScore.value.toFixed(1)} < ${f.rule.below})`
      )
      .join(", ");
    text +=
      category === baseCategory
        ? `; ${reasons} fired at the lowest category`
        : `; downgraded from ${baseCategory} by ${reasons}`;
  }
  return text;
}
