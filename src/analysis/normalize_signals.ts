import { ValidationError } from "./domain/errors";
import type { Polarity, SentimentSignal } from "./domain/types";
import { RawSentimentSignalListSchema } from "./schema";

const POLARITY_RANK: Record<Polarity, number> = {
  bearish: 0,
  neutral: 1,
  bullish: 2,
};

/**
 * Validates a sentiment list and returns it in canonical order with one
 * signal per source. The result does not depend on input order: when a
 * source appears twice, the canonically first entry is kept.
 */
export function normalizeSignals(raw: unknown): SentimentSignal[] {
  if (raw === undefined || raw === null) return [];

  const parsed = RawSentimentSignalListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `sentiment signals are malformed at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "invalid"}`,
      "signals"
    );
  }

  const sorted = [...parsed.data].sort(compareSignals);
  const seen = new Set<string>();
  const out: SentimentSignal[] = [];
  for (const signal of sorted) {
    const key = sourceKey(signal.source);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({
      source: signal.source,
      polarity: signal.polarity,
      note: signal.note,
      priceTarget: signal.priceTarget,
    });
  }
  return out;
}

function sourceKey(source: string): string {
  return source.trim().toLowerCase();
}

function compareSignals(a: SentimentSignal, b: SentimentSignal): number {
  return (
    compareText(sourceKey(a.source), sourceKey(b.source)) ||
    compareText(a.source, b.source) ||
    POLARITY_RANK[a.polarity] - POLARITY_RANK[b.polarity] ||
    compareText(a.note, b.note) ||
    (a.priceTarget ?? -1) - (b.priceTarget ?? -1)
  );
}

// Code-unit comparison keeps ordering independent of the host locale
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
