/**
 * Indicator Normalizer: turns a loosely typed provider payload into an
 * IndicatorRecord. Optional fields stay null when absent so scorers can
 * tell "missing" from "zero".
 */
import { getLogger } from "../util/logger";
import { pickNumber } from "../util/numbers";
import { ValidationError } from "./domain/errors";
import type { IndicatorRecord, RiskFlag } from "./domain/types";
import { computeHistoryStats } from "./price_history";
import { PriceHistorySchema, RawRiskFlagListSchema } from "./schema";

export type RawIndicatorInput = Record<string, unknown>;

export interface NormalizeOptions {
  /** Used as the record timestamp when the payload carries none. */
  asOf?: string;
}

type NumericField =
  | "price"
  | "marketCap"
  | "trailingPe"
  | "forwardPe"
  | "pegRatio"
  | "fiftyTwoWeekLow"
  | "fiftyTwoWeekHigh"
  | "ma50"
  | "ma200"
  | "rsi"
  | "beta"
  | "dividendYield";

type TextField = "companyName" | "sector" | "industry";

// Provider spellings accepted for each field, first match wins
const NUMERIC_ALIASES: Record<NumericField, string[]> = {
  price: ["price", "currentPrice", "regularMarketPrice", "last", "close"],
  marketCap: ["marketCap", "market_cap"],
  trailingPe: ["trailingPe", "trailingPE", "pe", "peRatio", "trailing_pe"],
  forwardPe: ["forwardPe", "forwardPE", "forward_pe"],
  pegRatio: ["pegRatio", "peg_ratio"],
  fiftyTwoWeekLow: ["fiftyTwoWeekLow", "low52w", "fifty_two_week_low"],
  fiftyTwoWeekHigh: ["fiftyTwoWeekHigh", "high52w", "fifty_two_week_high"],
  ma50: ["ma50", "fiftyDayAverage", "movingAverage50"],
  ma200: ["ma200", "twoHundredDayAverage", "movingAverage200"],
  rsi: ["rsi", "rsi14"],
  beta: ["beta"],
  dividendYield: ["dividendYield", "dividend_yield"],
};

const TEXT_ALIASES: Record<TextField, string[]> = {
  companyName: ["companyName", "shortName", "longName", "name"],
  sector: ["sector"],
  industry: ["industry"],
};

export function normalizeTicker(value: unknown): string {
  return String(value ?? "")
    .trim()
    .toUpperCase();
}

export function normalizeIndicators(
  raw: RawIndicatorInput,
  ticker: string,
  options: NormalizeOptions = {}
): IndicatorRecord {
  const logger = getLogger("analysis/normalize_indicators");

  const symbol = normalizeTicker(ticker) || normalizeTicker(raw["ticker"]);
  if (!symbol) {
    throw new ValidationError("ticker is required", "ticker");
  }

  const fields = flattenMovingAverages(raw);
  const price = readRequiredNumber(fields, "price");
  const marketCap = readRequiredNumber(fields, "marketCap");

  const low = readOptionalNumber(fields, "fiftyTwoWeekLow");
  const high = readOptionalNumber(fields, "fiftyTwoWeekHigh");
  if (low != null && high != null && low > high) {
    throw new ValidationError(
      `52-week low ${low} is above 52-week high ${high}`,
      "fiftyTwoWeekLow"
    );
  }

  const rsi = readOptionalNumber(fields, "rsi");
  if (rsi != null && (rsi < 0 || rsi > 100)) {
    throw new ValidationError(`rsi must be within [0, 100], got ${rsi}`, "rsi");
  }

  const record: IndicatorRecord = {
    ticker: symbol,
    asOf: readTimestamp(raw, options.asOf),
    price,
    marketCap,
    trailingPe: readOptionalNumber(fields, "trailingPe"),
    forwardPe: readOptionalNumber(fields, "forwardPe"),
    pegRatio: readOptionalNumber(fields, "pegRatio"),
    fiftyTwoWeekLow: low,
    fiftyTwoWeekHigh: high,
    movingAverages: {
      ma50: readOptionalNumber(fields, "ma50"),
      ma200: readOptionalNumber(fields, "ma200"),
    },
    rsi,
    beta: readOptionalNumber(fields, "beta"),
    dividendYield: readOptionalNumber(fields, "dividendYield"),
    companyName: readText(fields, "companyName"),
    sector: readText(fields, "sector"),
    industry: readText(fields, "industry"),
    riskFlags: readRiskFlags(raw),
    history: readHistory(raw),
  };

  logger.debug(
    {
      ticker: symbol,
      missing: Object.entries(record)
        .filter(([, value]) => value === null)
        .map(([key]) => key),
    },
    "indicators normalized"
  );
  return record;
}

function flattenMovingAverages(raw: RawIndicatorInput): RawIndicatorInput {
  const nested = raw["movingAverages"];
  if (nested && typeof nested === "object" && !Array.isArray(nested)) {
    return { ...nested, ...raw };
  }
  return raw;
}

function lookup(fields: RawIndicatorInput, aliases: string[]): unknown {
  for (const key of aliases) {
    if (fields[key] !== undefined) return fields[key];
  }
  return undefined;
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

function readRequiredNumber(
  fields: RawIndicatorInput,
  field: "price" | "marketCap"
): number {
  const value = lookup(fields, NUMERIC_ALIASES[field]);
  if (isAbsent(value)) {
    throw new ValidationError(`${field} is required`, field);
  }
  const n = pickNumber(value);
  if (n == null) {
    throw new ValidationError(
      `${field} must be numeric, got ${JSON.stringify(value)}`,
      field
    );
  }
  if (n <= 0) {
    throw new ValidationError(`${field} must be positive, got ${n}`, field);
  }
  return n;
}

function readOptionalNumber(
  fields: RawIndicatorInput,
  field: NumericField
): number | null {
  const value = lookup(fields, NUMERIC_ALIASES[field]);
  if (isAbsent(value)) return null;
  const n = pickNumber(value);
  if (n == null) {
    throw new ValidationError(
      `${field} must be numeric when present, got ${JSON.stringify(value)}`,
      field
    );
  }
  return n;
}

function readText(fields: RawIndicatorInput, field: TextField): string | null {
  const value = lookup(fields, TEXT_ALIASES[field]);
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readTimestamp(raw: RawIndicatorInput, fallback?: string): string {
  const value = raw["timestamp"] ?? raw["asOf"];
  if (isAbsent(value)) {
    return fallback ?? new Date().toISOString();
  }
  const date =
    typeof value === "number" || typeof value === "string"
      ? new Date(value)
      : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(
      `timestamp is not a valid date: ${JSON.stringify(value)}`,
      "timestamp"
    );
  }
  return date.toISOString();
}

function readRiskFlags(raw: RawIndicatorInput): RiskFlag[] | null {
  const value = raw["riskFlags"] ?? raw["risks"];
  if (value === undefined || value === null) return null;
  const parsed = RawRiskFlagListSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `riskFlags are malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      "riskFlags"
    );
  }
  return parsed.data.map(flag => ({ ...flag, origin: "reported" as const }));
}

function readHistory(raw: RawIndicatorInput): IndicatorRecord["history"] {
  const value = raw["priceHistory"] ?? raw["closes"];
  if (value === undefined || value === null) return null;
  const parsed = PriceHistorySchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `priceHistory must be a list of positive closes`,
      "priceHistory"
    );
  }
  return computeHistoryStats(parsed.data);
}
