import { getScoringConfig, type ScoringConfig } from "../../analysis/config";
import { ValidationError, isReportEngineError } from "../../analysis/domain/errors";
import { normalizeTicker } from "../../analysis/normalize_indicators";
import { withRetry, withTimeout } from "../../util/async";
import { getLogger } from "../../util/logger";
import type { Report } from "../domain/types";
import type { MarketDataReader, NewsProvider } from "../infrastructure/contracts";
import { generateReport, type GenerateReportInput } from "./generate_report";

export type BatchItemStatus = "ok" | "degraded" | "failed";

export interface BatchItem {
  ticker: string;
  status: BatchItemStatus;
  reason: string | null;
  report: Report | null;
}

export interface BatchResult {
  generatedAt: string;
  items: BatchItem[];
  counts: Record<BatchItemStatus, number>;
}

export interface RunReportBatchInput {
  tickers: string[];
  generatedAt?: string;
  perspective?: GenerateReportInput["perspective"];
  includeVerdict?: boolean;
}

export interface RunReportBatchDependencies {
  marketData: MarketDataReader;
  news: NewsProvider;
  config?: ScoringConfig;
  now?: () => Date;
}

/**
 * Produces one report per ticker. Tickers are isolated from each other: a
 * failure becomes a `failed` item with a reason and never rejects the batch.
 * Only the collaborator fetches are retried; each ticker's whole run is
 * bounded by `report.timeoutMs`.
 */
export async function runReportBatch(
  input: RunReportBatchInput,
  deps: RunReportBatchDependencies
): Promise<BatchResult> {
  const logger = getLogger("reporting/run_report_batch");
  const config = deps.config ?? getScoringConfig();
  const generatedAt = input.generatedAt ?? (deps.now ?? (() => new Date()))().toISOString();
  const tickers = normalizeTickers(input.tickers);

  const items = await Promise.all(
    tickers.map(async (ticker): Promise<BatchItem> => {
      try {
        const report = await withTimeout(
          runOne(ticker, generatedAt, input, deps, config),
          config.report.timeoutMs,
          `report ${ticker}`
        );
        return {
          ticker,
          status: report.status,
          reason: report.statusReason,
          report,
        };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        logger.error(
          {
            ticker,
            code: isReportEngineError(err) ? err.code : undefined,
            fatal: isReportEngineError(err) ? err.fatal : undefined,
            reason,
          },
          "report run failed"
        );
        return { ticker, status: "failed", reason, report: null };
      }
    })
  );

  const counts: Record<BatchItemStatus, number> = { ok: 0, degraded: 0, failed: 0 };
  for (const item of items) counts[item.status] += 1;
  logger.info({ generatedAt, ...counts }, "report batch finished");

  return { generatedAt, items, counts };
}

async function runOne(
  ticker: string,
  generatedAt: string,
  input: RunReportBatchInput,
  deps: RunReportBatchDependencies,
  config: ScoringConfig
): Promise<Report> {
  const retry = {
    maxRetries: config.fetch.maxRetries,
    delayMs: config.fetch.delayMs,
    backoffMultiplier: config.fetch.backoffMultiplier,
  };
  const params = { ticker, asOf: generatedAt };

  const [indicators, signals] = await Promise.all([
    withRetry(() => deps.marketData.loadIndicators(params), {
      ...retry,
      label: `market data ${ticker}`,
    }),
    withRetry(() => deps.news.loadSignals(params), {
      ...retry,
      label: `news ${ticker}`,
    }),
  ]);

  if (!indicators) {
    throw new ValidationError(`no market data available for ${ticker}`, "indicators");
  }

  return generateReport(
    {
      ticker,
      indicators,
      signals,
      generatedAt,
      perspective: input.perspective,
      includeVerdict: input.includeVerdict,
    },
    { config, now: deps.now }
  );
}

function normalizeTickers(tickers: string[]): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const raw of tickers) {
    const norm = normalizeTicker(raw);
    if (!norm || seen.has(norm)) continue;
    seen.add(norm);
    ordered.push(norm);
  }
  return ordered;
}
