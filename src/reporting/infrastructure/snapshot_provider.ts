/**
 * Serves already-fetched snapshots through the collaborator contracts.
 *
 * Snapshot shape (JSON):
 *   { "<TICKER>": { "indicators": { ... }, "signals": [ ... ] } }
 */
import { readFileSync } from "fs";
import { z } from "zod";
import { normalizeTicker } from "../../analysis/normalize_indicators";
import type { MarketDataReader, NewsProvider } from "./contracts";

const SnapshotFileSchema = z.record(
  z.string(),
  z.object({
    indicators: z.record(z.string(), z.unknown()),
    signals: z.array(z.unknown()).default([]),
  })
);

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

export function createSnapshotProviders(snapshot: SnapshotFile): {
  marketData: MarketDataReader;
  news: NewsProvider;
} {
  const byTicker = new Map(
    Object.entries(snapshot).map(([ticker, entry]) => [normalizeTicker(ticker), entry])
  );
  return {
    marketData: {
      async loadIndicators({ ticker }) {
        return byTicker.get(normalizeTicker(ticker))?.indicators ?? null;
      },
    },
    news: {
      async loadSignals({ ticker }) {
        return byTicker.get(normalizeTicker(ticker))?.signals ?? [];
      },
    },
  };
}

export function readSnapshotFile(filePath: string): SnapshotFile {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  return SnapshotFileSchema.parse(raw);
}
