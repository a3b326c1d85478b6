/**
 * Domain types for indicator scoring.
 */

export type Polarity = "bullish" | "bearish" | "neutral";

export type RiskCategory = "regulatory" | "supply" | "competitive" | "macro";

export type RiskSeverity = "low" | "medium" | "high" | "critical";

export interface RiskFlag {
  category: RiskCategory;
  severity: RiskSeverity;
  note: string;
  /** "reported" came with the input; "keyword" was detected in signal notes. */
  origin: "reported" | "keyword";
}

export interface MovingAverages {
  ma50: number | null;
  ma200: number | null;
}

export interface PriceHistoryStats {
  sessions: number;
  annualizedReturn: number;
  annualizedVolatility: number;
  maxDrawdown: number;
}

export interface IndicatorRecord {
  ticker: string;
  asOf: string;
  price: number;
  marketCap: number;
  trailingPe: number | null;
  forwardPe: number | null;
  pegRatio: number | null;
  fiftyTwoWeekLow: number | null;
  fiftyTwoWeekHigh: number | null;
  movingAverages: MovingAverages;
  rsi: number | null;
  beta: number | null;
  dividendYield: number | null;
  companyName: string | null;
  sector: string | null;
  industry: string | null;
  riskFlags: RiskFlag[] | null;
  history: PriceHistoryStats | null;
}

export interface SentimentSignal {
  source: string;
  polarity: Polarity;
  note: string;
  priceTarget: number | null;
}

export type SignalGroup = "valuation" | "momentum" | "sentiment" | "risk";

export interface SubScore {
  group: SignalGroup;
  value: number;
  weight: number;
  /** false when the value is a neutral default standing in for missing data */
  confidence: boolean;
  evidence: string[];
}

export interface CompositeScore {
  /** weighted mean rounded to one decimal */
  value: number;
  /** weighted mean before rounding; category mapping reads this */
  rawValue: number;
  subScores: SubScore[];
  effectiveWeightSum: number;
}

export const RECOMMENDATION_CATEGORIES = [
  "Strong Sell",
  "Sell",
  "Hold",
  "Buy",
  "Strong Buy",
] as const;

export type RecommendationCategory = (typeof RECOMMENDATION_CATEGORIES)[number];

export interface Recommendation {
  category: RecommendationCategory;
  /** category from the thresholds alone, before override rules */
  baseCategory: RecommendationCategory;
  score: number;
  rationale: string;
  appliedRules: string[];
}

export interface ScoringInput {
  indicators: IndicatorRecord;
  signals: SentimentSignal[];
}
