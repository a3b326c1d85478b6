import { IncompleteReportError } from "../../analysis/domain/errors";
import type {
  IndicatorRecord,
  Recommendation,
  RiskFlag,
  SentimentSignal,
} from "../../analysis/domain/types";
import { DISCLAIMER, assembleReport, buildReportId } from "../business/assemble_report";
import type { ReportDraft, ReportSection } from "../domain/types";

const indicators: IndicatorRecord = {
  ticker: "ACME",
  asOf: "2025-01-15T21:00:00.000Z",
  price: 40,
  marketCap: 2_500_000_000,
  trailingPe: 18.456,
  forwardPe: null,
  pegRatio: null,
  fiftyTwoWeekLow: 30,
  fiftyTwoWeekHigh: 50,
  movingAverages: { ma50: 41.5, ma200: null },
  rsi: 55.25,
  beta: null,
  dividendYield: 0.021,
  companyName: "Acme Tools",
  sector: "Industrials",
  industry: null,
  riskFlags: null,
  history: null,
};

const signals: SentimentSignal[] = [
  { source: "Desk A", polarity: "bullish", note: "Order book at record", priceTarget: 50 },
  { source: "Desk B", polarity: "neutral", note: "", priceTarget: 45 },
];

const riskFlags: RiskFlag[] = [
  { category: "supply", severity: "medium", note: "single steel supplier", origin: "reported" },
];

const recommendation: Recommendation = {
  category: "Buy",
  baseCategory: "Buy",
  score: 66.2,
  rationale: "Buy at composite 66.2; led by momentum 70.0 and sentiment 75.0",
  appliedRules: [],
};

function draft(overrides: ReportDraft = {}): ReportDraft {
  return {
    ticker: "ACME",
    generatedAt: "2025-01-16T00:00:00.000Z",
    status: "ok",
    indicators,
    signals,
    riskFlags,
    compositeScore: { value: 66.2, rawValue: 66.2, subScores: [], effectiveWeightSum: 1 },
    recommendation,
    ...overrides,
  };
}

function section<K extends ReportSection["kind"]>(
  sections: readonly ReportSection[],
  kind: K
): Extract<ReportSection, { kind: K }> {
  const found = sections.find(
    (s): s is Extract<ReportSection, { kind: K }> => s.kind === kind
  );
  if (!found) throw new Error(`section ${kind} missing`);
  return found;
}

const options = { includeVerdict: true, perspective: "neutral" as const };

describe("assembleReport", () => {
  it("builds the headline and company snapshot", () => {
    const report = assembleReport(draft(), options);

    expect(report.reportId).toBe(buildReportId("ACME", "2025-01-16T00:00:00.000Z"));
    expect(section(report.sections, "executive_summary").body.headline).toBe(
      "Acme Tools (ACME) rates Buy with a composite score of 66.2/100."
    );
    expect(section(report.sections, "company_snapshot").body).toMatchObject({
      companyName: "Acme Tools",
      marketCapDisplay: "$2.50B",
      industry: null,
    });
  });

  it("formats indicator rows with N/A for missing values", () => {
    const report = assembleReport(draft(), options);
    const rows = section(report.sections, "key_indicators").body.rows;

    expect(rows).toHaveLength(15);
    expect(rows.find(r => r.label === "Price")?.display).toBe("$40.00");
    expect(rows.find(r => r.label === "Trailing P/E")?.display).toBe("18.46");
    expect(rows.find(r => r.label === "RSI (14)")?.display).toBe("55.3");
    expect(rows.find(r => r.label === "Dividend Yield")?.display).toBe("2.10%");
    expect(rows.find(r => r.label === "200-Day Moving Average")).toEqual({
      label: "200-Day Moving Average",
      value: null,
      display: "N/A",
    });
  });

  it("summarizes price targets and polarity counts", () => {
    const report = assembleReport(draft(), options);
    const body = section(report.sections, "news_sentiment").body;

    expect(body.counts).toEqual({ bullish: 1, neutral: 1, bearish: 0 });
    expect(body.averagePriceTarget).toBe(47.5);
    expect(body.impliedUpsidePct).toBe(18.8);
  });

  it("writes the perspective statement for each stance", () => {
    const neutral = assembleReport(draft(), options);
    const bearish = assembleReport(draft(), { ...options, perspective: "bearish" });
    const bullish = assembleReport(draft(), { ...options, perspective: "bullish" });

    expect(section(neutral.sections, "final_perspective").body).toEqual({
      perspective: "neutral",
      statement:
        "ACME rates Buy at 66.2/100. Bull case: Desk A: Order book at record. Bear case: none reported.",
      disclaimer: DISCLAIMER,
    });
    expect(section(bearish.sections, "final_perspective").body.statement).toBe(
      "ACME rates Buy at 66.2/100. Main concern: medium supply risk (single steel supplier). Offsetting factor: Desk A: Order book at record."
    );
    expect(section(bullish.sections, "final_perspective").body.statement).toBe(
      "ACME rates Buy at 66.2/100. Upside case: Desk A: Order book at record. Key risk to monitor: medium supply risk (single steel supplier)."
    );
  });

  it("appends the verdict last only when asked", () => {
    const withVerdict = assembleReport(draft(), options);
    const without = assembleReport(draft(), { ...options, includeVerdict: false });

    expect(withVerdict.sections[6]).toMatchObject({
      kind: "analyst_verdict",
      position: 7,
      body: { score: 66.2, rationale: recommendation.rationale },
    });
    expect(without.sections.map(s => s.kind)).not.toContain("analyst_verdict");
  });

  it("owns its inputs and freezes the result", () => {
    const mutable = signals.map(s => ({ ...s }));
    const report = assembleReport(draft({ signals: mutable }), options);
    mutable[0].note = "edited afterwards";

    expect(report.signals[0].note).toBe("Order book at record");
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.sections[0])).toBe(true);
  });

  it("accepts a degraded draft without a composite", () => {
    const report = assembleReport(
      draft({
        status: "degraded",
        statusReason: "no sub-scores to aggregate",
        compositeScore: null,
        indicators: { ...indicators, companyName: null },
      }),
      options
    );
    expect(section(report.sections, "final_perspective").body.statement).toBe(
      "ACME could not be rated (no sub-scores to aggregate). Bull case: Desk A: Order book at record. Bear case: none reported."
    );
    expect(section(report.sections, "analyst_verdict").body.score).toBeNull();
  });

  it("refuses a draft with required fields unset", () => {
    expect(() => assembleReport({ ticker: "ACME" }, options)).toThrow(IncompleteReportError);
    expect(() => assembleReport({ ticker: "ACME" }, options)).toThrow(
      "Report draft is missing required fields: generatedAt, indicators, signals, riskFlags, recommendation, compositeScore"
    );
  });
});
