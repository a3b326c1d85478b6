import { aggregateScores } from "../../analysis/aggregate_scores";
import {
  getScoringConfig,
  type InvestorPerspective,
  type ScoringConfig,
} from "../../analysis/config";
import { InsufficientDataError } from "../../analysis/domain/errors";
import type { CompositeScore, Recommendation } from "../../analysis/domain/types";
import {
  mapRecommendation,
  noRatingRecommendation,
} from "../../analysis/map_recommendation";
import {
  normalizeIndicators,
  type RawIndicatorInput,
} from "../../analysis/normalize_indicators";
import { normalizeSignals } from "../../analysis/normalize_signals";
import { collectRiskFlags, runScorers, type Scorer } from "../../analysis/scorers";
import { withRunContext } from "../../util/logger";
import type { Report, ReportDraft } from "../domain/types";
import { assembleReport } from "./assemble_report";

export interface GenerateReportInput {
  ticker: string;
  indicators: RawIndicatorInput;
  signals?: unknown;
  /** Fixing this makes the run reproducible byte for byte. */
  generatedAt?: string;
  perspective?: InvestorPerspective;
  includeVerdict?: boolean;
}

export interface GenerateReportDependencies {
  config?: ScoringConfig;
  scorers?: Scorer[];
  now?: () => Date;
}

/**
 * One report run: normalize, score every group in parallel, aggregate, map
 * to a recommendation and assemble. Each call builds its own draft; nothing
 * is shared between runs except the read-only config.
 *
 * Throws ValidationError, InvariantViolation and IncompleteReportError.
 * InsufficientDataError is absorbed into a degraded report.
 */
export async function generateReport(
  input: GenerateReportInput,
  deps: GenerateReportDependencies = {}
): Promise<Report> {
  const config = deps.config ?? getScoringConfig();
  const now = deps.now ?? (() => new Date());
  const generatedAt = input.generatedAt ?? now().toISOString();

  const indicators = normalizeIndicators(input.indicators, input.ticker, {
    asOf: generatedAt,
  });
  const logger = withRunContext("reporting/generate_report", {
    ticker: indicators.ticker,
    runId: generatedAt,
  });
  const signals = normalizeSignals(input.signals);
  const scoringInput = { indicators, signals };

  const subScores = await runScorers(scoringInput, config, deps.scorers);
  logger.debug(
    { subScores: subScores.map(s => ({ group: s.group, value: s.value, confidence: s.confidence })) },
    "sub-scores computed"
  );

  const draft: ReportDraft = {
    ticker: indicators.ticker,
    generatedAt,
    indicators,
    signals,
    riskFlags: collectRiskFlags(scoringInput, config),
  };

  let compositeScore: CompositeScore | null;
  let recommendation: Recommendation;
  try {
    compositeScore = aggregateScores(subScores, config);
    recommendation = mapRecommendation(compositeScore, config);
    draft.status = "ok";
  } catch (err) {
    if (!(err instanceof InsufficientDataError)) throw err;
    logger.warn({ reason: err.message }, "composite unavailable, degrading report");
    compositeScore = null;
    recommendation = noRatingRecommendation(err.message, config);
    draft.status = "degraded";
    draft.statusReason = err.message;
  }
  draft.compositeScore = compositeScore;
  draft.recommendation = recommendation;

  const report = assembleReport(draft, {
    includeVerdict: input.includeVerdict ?? config.report.includeVerdict,
    perspective: input.perspective ?? config.report.perspective,
  });

  logger.info(
    {
      status: report.status,
      score: compositeScore?.value ?? null,
      category: recommendation.category,
      appliedRules: recommendation.appliedRules,
    },
    "report generated"
  );
  return report;
}
