import { clamp } from "../../util/numbers";
import type { ScoringConfig } from "../config";
import type { RiskCategory, RiskFlag, ScoringInput } from "../domain/types";
import { defineScorer, neutralDefault } from "./base";

const CATEGORIES: RiskCategory[] = ["regulatory", "supply", "competitive", "macro"];

/**
 * Reported risk flags plus at most one keyword flag per category that no
 * reported flag already covers. Keyword flags come from signal notes.
 */
export function collectRiskFlags(
  { indicators, signals }: ScoringInput,
  config: ScoringConfig
): RiskFlag[] {
  const reported = indicators.riskFlags ?? [];
  const covered = new Set(reported.map(flag => flag.category));
  const detected: RiskFlag[] = [];

  for (const category of CATEGORIES) {
    if (covered.has(category)) continue;
    const hit = findKeyword(signals, config.risk.keywords[category]);
    if (hit) {
      detected.push({
        category,
        severity: config.risk.keywordSeverity,
        note: `"${hit.keyword}" mentioned by ${hit.source}`,
        origin: "keyword",
      });
    }
  }

  return [...reported, ...detected];
}

function findKeyword(
  signals: ScoringInput["signals"],
  keywords: string[]
): { keyword: string; source: string } | null {
  const patterns = keywords.map(keyword => ({
    keyword,
    pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i"),
  }));
  for (const signal of signals) {
    for (const { keyword, pattern } of patterns) {
      if (pattern.test(signal.note)) return { keyword, source: signal.source };
    }
  }
  return null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Risk: inverse score, 100 minus the severity penalty of every flag.
 */
export const RiskScorer = defineScorer({
  group: "risk",
  description: "Severity-weighted count of regulatory, supply, competitive and macro flags",
  score(input, config) {
    const flags = collectRiskFlags(input, config);
    if (input.indicators.riskFlags === null && flags.length === 0) {
      return neutralDefault(config, "no risk data reported");
    }
    if (flags.length === 0) {
      return { value: 100, confidence: true, evidence: ["no risk flags raised"] };
    }

    const penalties = config.risk.severityPenalties;
    const total = flags.reduce((sum, flag) => sum + penalties[flag.severity], 0);
    return {
      value: clamp(100 - total, 0, 100),
      confidence: true,
      evidence: flags.map(
        flag => `${flag.severity} ${flag.category} risk: ${flag.note}`
      ),
    };
  },
});
