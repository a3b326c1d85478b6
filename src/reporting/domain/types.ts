/**
 * Domain types for the assembled equity report.
 */
import type { InvestorPerspective } from "../../analysis/config";
import type {
  CompositeScore,
  IndicatorRecord,
  Polarity,
  Recommendation,
  RecommendationCategory,
  RiskFlag,
  SentimentSignal,
} from "../../analysis/domain/types";

export type ReportStatus = "ok" | "degraded";

export const SECTION_ORDER = [
  "executive_summary",
  "company_snapshot",
  "key_indicators",
  "news_sentiment",
  "risks_opportunities",
  "final_perspective",
  "analyst_verdict",
] as const;

export type SectionKind = (typeof SECTION_ORDER)[number];

export const SECTION_TITLES: Record<SectionKind, string> = {
  executive_summary: "Executive Summary",
  company_snapshot: "Company Snapshot",
  key_indicators: "Key Financial Indicators",
  news_sentiment: "Recent News & Sentiment",
  risks_opportunities: "Risks & Opportunities",
  final_perspective: "Final Perspective",
  analyst_verdict: "Analyst Verdict",
};

export interface IndicatorRow {
  label: string;
  value: number | null;
  display: string;
}

export interface SectionBodies {
  executive_summary: {
    headline: string;
    category: RecommendationCategory;
    compositeScore: number | null;
    status: ReportStatus;
  };
  company_snapshot: {
    ticker: string;
    companyName: string | null;
    sector: string | null;
    industry: string | null;
    price: number;
    marketCap: number;
    marketCapDisplay: string;
    asOf: string;
  };
  key_indicators: {
    rows: IndicatorRow[];
  };
  news_sentiment: {
    counts: Record<Polarity, number>;
    averagePriceTarget: number | null;
    impliedUpsidePct: number | null;
    items: SentimentSignal[];
  };
  risks_opportunities: {
    risks: RiskFlag[];
    bullCase: string[];
    bearCase: string[];
  };
  final_perspective: {
    perspective: InvestorPerspective;
    statement: string;
    disclaimer: string;
  };
  analyst_verdict: {
    score: number | null;
    category: RecommendationCategory;
    baseCategory: RecommendationCategory;
    rationale: string;
    appliedRules: string[];
  };
}

export type ReportSection = {
  [K in SectionKind]: {
    kind: K;
    title: string;
    position: number;
    body: SectionBodies[K];
  };
}[SectionKind];

export interface Report {
  readonly reportId: string;
  readonly ticker: string;
  readonly generatedAt: string;
  readonly status: ReportStatus;
  readonly statusReason: string | null;
  readonly perspective: InvestorPerspective;
  readonly indicators: IndicatorRecord;
  readonly signals: readonly SentimentSignal[];
  readonly riskFlags: readonly RiskFlag[];
  readonly compositeScore: CompositeScore | null;
  readonly recommendation: Recommendation;
  readonly sections: readonly ReportSection[];
}

/**
 * What the pipeline has filled in so far. The assembler refuses drafts with
 * required fields still unset.
 */
export interface ReportDraft {
  ticker?: string;
  generatedAt?: string;
  status?: ReportStatus;
  statusReason?: string | null;
  indicators?: IndicatorRecord;
  signals?: SentimentSignal[];
  riskFlags?: RiskFlag[];
  compositeScore?: CompositeScore | null;
  recommendation?: Recommendation;
}
