/**
 * Document Assembler: projects a completed draft into the ordered report
 * sections. No scoring happens here; every value comes from the draft.
 */
import type { InvestorPerspective } from "../../analysis/config";
import { IncompleteReportError } from "../../analysis/domain/errors";
import type {
  IndicatorRecord,
  RiskFlag,
  SentimentSignal,
} from "../../analysis/domain/types";
import { countPolarities } from "../../analysis/scorers/sentiment";
import { deepFreeze } from "../../util/freeze";
import {
  formatLargeNumber,
  formatNumber,
  formatPercent,
  roundTo,
} from "../../util/numbers";
import {
  SECTION_TITLES,
  type IndicatorRow,
  type Report,
  type ReportDraft,
  type ReportSection,
} from "../domain/types";

export const DISCLAIMER =
  "Generated from a point-in-time data snapshot for information only; not investment advice.";

export interface AssembleOptions {
  includeVerdict: boolean;
  perspective: InvestorPerspective;
}

export function buildReportId(ticker: string, generatedAt: string): string {
  return `REPORT#${ticker}#${generatedAt}`;
}

export function assembleReport(draft: ReportDraft, options: AssembleOptions): Report {
  const {
    ticker,
    generatedAt,
    indicators,
    signals,
    riskFlags,
    recommendation,
  } = draft;
  const status = draft.status ?? "ok";
  const compositeScore = draft.compositeScore ?? null;

  const missing: string[] = [];
  if (!ticker) missing.push("ticker");
  if (!generatedAt) missing.push("generatedAt");
  if (!indicators) missing.push("indicators");
  if (!signals) missing.push("signals");
  if (!riskFlags) missing.push("riskFlags");
  if (!recommendation) missing.push("recommendation");
  if (status === "ok" && !compositeScore) missing.push("compositeScore");
  if (
    missing.length > 0 ||
    !ticker ||
    !generatedAt ||
    !indicators ||
    !signals ||
    !riskFlags ||
    !recommendation
  ) {
    throw new IncompleteReportError(missing);
  }

  // The report owns its inputs; later runs cannot reach into it
  const owned = structuredClone({
    indicators,
    signals,
    riskFlags,
    compositeScore,
    recommendation,
  });

  const label = owned.indicators.companyName
    ? `${owned.indicators.companyName} (${ticker})`
    : ticker;
  const statusReason = status === "degraded" ? draft.statusReason ?? "insufficient data" : null;
  const bullCase = notesFor(owned.signals, "bullish");
  const bearCase = notesFor(owned.signals, "bearish");

  let position = 0;
  const next = () => ++position;

  const sections: ReportSection[] = [
    {
      kind: "executive_summary",
      title: SECTION_TITLES.executive_summary,
      position: next(),
      body: {
        headline: owned.compositeScore
          ? `${label} rates ${owned.recommendation.category} with a composite score of ${owned.compositeScore.value.toFixed(1)}/100.`
          : `${label} is shown as ${owned.recommendation.category} without a composite score: ${statusReason}.`,
        category: owned.recommendation.category,
        compositeScore: owned.compositeScore?.value ?? null,
        status,
      },
    },
    {
      kind: "company_snapshot",
      title: SECTION_TITLES.company_snapshot,
      position: next(),
      body: {
        ticker,
        companyName: owned.indicators.companyName,
        sector: owned.indicators.sector,
        industry: owned.indicators.industry,
        price: owned.indicators.price,
        marketCap: owned.indicators.marketCap,
        marketCapDisplay: formatLargeNumber(owned.indicators.marketCap),
        asOf: owned.indicators.asOf,
      },
    },
    {
      kind: "key_indicators",
      title: SECTION_TITLES.key_indicators,
      position: next(),
      body: { rows: indicatorRows(owned.indicators) },
    },
    {
      kind: "news_sentiment",
      title: SECTION_TITLES.news_sentiment,
      position: next(),
      body: sentimentBody(owned.signals, owned.indicators.price),
    },
    {
      kind: "risks_opportunities",
      title: SECTION_TITLES.risks_opportunities,
      position: next(),
      body: { risks: owned.riskFlags, bullCase, bearCase },
    },
    {
      kind: "final_perspective",
      title: SECTION_TITLES.final_perspective,
      position: next(),
      body: {
        perspective: options.perspective,
        statement: perspectiveStatement({
          perspective: options.perspective,
          opening: owned.compositeScore
            ? `${ticker} rates ${owned.recommendation.category} at ${owned.compositeScore.value.toFixed(1)}/100.`
            : `${ticker} could not be rated (${statusReason}).`,
          bullCase,
          bearCase,
          risks: owned.riskFlags,
        }),
        disclaimer: DISCLAIMER,
      },
    },
  ];

  if (options.includeVerdict) {
    sections.push({
      kind: "analyst_verdict",
      title: SECTION_TITLES.analyst_verdict,
      position: next(),
      body: {
        score: owned.compositeScore?.value ?? null,
        category: owned.recommendation.category,
        baseCategory: owned.recommendation.baseCategory,
        rationale: owned.recommendation.rationale,
        appliedRules: owned.recommendation.appliedRules,
      },
    });
  }

  return deepFreeze({
    reportId: buildReportId(ticker, generatedAt),
    ticker,
    generatedAt,
    status,
    statusReason,
    perspective: options.perspective,
    indicators: owned.indicators,
    signals: owned.signals,
    riskFlags: owned.riskFlags,
    compositeScore: owned.compositeScore,
    recommendation: owned.recommendation,
    sections,
  });
}

function money(value: number | null): string {
  return value == null ? "N/A" : `$${value.toFixed(2)}`;
}

function indicatorRows(indicators: IndicatorRecord): IndicatorRow[] {
  const { movingAverages, history } = indicators;
  const row = (
    label: string,
    value: number | null,
    display: (v: number | null) => string
  ): IndicatorRow => ({ label, value, display: display(value) });

  return [
    row("Price", indicators.price, money),
    row("Market Cap", indicators.marketCap, formatLargeNumber),
    row("Trailing P/E", indicators.trailingPe, v => formatNumber(v)),
    row("Forward P/E", indicators.forwardPe, v => formatNumber(v)),
    row("PEG Ratio", indicators.pegRatio, v => formatNumber(v)),
    row("52-Week Low", indicators.fiftyTwoWeekLow, money),
    row("52-Week High", indicators.fiftyTwoWeekHigh, money),
    row("50-Day Moving Average", movingAverages.ma50, money),
    row("200-Day Moving Average", movingAverages.ma200, money),
    row("RSI (14)", indicators.rsi, v => formatNumber(v, 1)),
    row("Beta", indicators.beta, v => formatNumber(v)),
    row("Dividend Yield", indicators.dividendYield, v => formatPercent(v)),
    row("Annualized Return", history?.annualizedReturn ?? null, v => formatPercent(v)),
    row("Annualized Volatility", history?.annualizedVolatility ?? null, v => formatPercent(v)),
    row("Max Drawdown", history?.maxDrawdown ?? null, v => formatPercent(v)),
  ];
}

function sentimentBody(signals: SentimentSignal[], price: number) {
  const targets = signals
    .map(s => s.priceTarget)
    .filter((t): t is number => t != null);
  const averagePriceTarget =
    targets.length > 0
      ? roundTo(targets.reduce((sum, t) => sum + t, 0) / targets.length, 2)
      : null;
  return {
    counts: countPolarities(signals),
    averagePriceTarget,
    impliedUpsidePct:
      averagePriceTarget != null
        ? roundTo((averagePriceTarget / price - 1) * 100, 1)
        : null,
    items: signals,
  };
}

function notesFor(signals: SentimentSignal[], polarity: "bullish" | "bearish"): string[] {
  return signals
    .filter(s => s.polarity === polarity && s.note.length > 0)
    .map(s => `${s.source}: ${s.note}`);
}

function describeRisk(flag: RiskFlag | undefined): string {
  return flag ? `${flag.severity} ${flag.category} risk (${flag.note})` : "no flagged risks";
}

function perspectiveStatement(args: {
  perspective: InvestorPerspective;
  opening: string;
  bullCase: string[];
  bearCase: string[];
  risks: RiskFlag[];
}): string {
  const { perspective, opening, bullCase, bearCase, risks } = args;
  const bull = bullCase[0] ?? "none reported";
  const bear = bearCase[0] ?? "none reported";
  switch (perspective) {
    case "bullish":
      return `${opening} Upside case: ${bull}. Key risk to monitor: ${describeRisk(risks[0])}.`;
    case "bearish":
      return `${opening} Main concern: ${bearCase[0] ?? describeRisk(risks[0])}. Offsetting factor: ${bull}.`;
    case "neutral":
      return `${opening} Bull case: ${bull}. Bear case: ${bear}.`;
  }
}
