import type { RawIndicatorInput } from "../../analysis/normalize_indicators";

/**
 * Market data collaborator: one raw indicator payload per ticker, or null
 * when the provider has nothing for it.
 */
export interface MarketDataReader {
  loadIndicators(params: {
    ticker: string;
    asOf: string;
  }): Promise<RawIndicatorInput | null>;
}

/**
 * News and sentiment collaborator: raw {source, polarity, note, priceTarget}
 * items, validated by the engine.
 */
export interface NewsProvider {
  loadSignals(params: { ticker: string; asOf: string }): Promise<unknown[]>;
}
