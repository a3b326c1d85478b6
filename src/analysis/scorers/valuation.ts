import { clamp } from "../../util/numbers";
import type { ScoringConfig, ValuationBand } from "../config";
import { defineScorer, neutralDefault } from "./base";

/**
 * Valuation: trailing P/E placed inside the sector's reference band.
 * At or below `cheap` scores 100, at or above `expensive` scores 0.
 */
export const ValuationScorer = defineScorer({
  group: "valuation",
  description: "Trailing P/E relative to the sector reference band",
  score({ indicators }, config) {
    const pe = indicators.trailingPe;
    if (pe == null) {
      return neutralDefault(config, "trailing P/E unavailable");
    }

    if (pe <= 0) {
      return {
        value: 0,
        confidence: true,
        evidence: [`trailing P/E ${pe.toFixed(1)} reflects negative earnings`],
      };
    }

    const { band, label } = resolveBand(indicators.sector, config);
    const value = clamp(
      (100 * (band.expensive - pe)) / (band.expensive - band.cheap),
      0,
      100
    );
    return {
      value,
      confidence: true,
      evidence: [
        `trailing P/E ${pe.toFixed(1)} against ${label} band ${band.cheap}-${band.expensive}`,
      ],
    };
  },
});

export function resolveBand(
  sector: string | null,
  config: ScoringConfig
): { band: ValuationBand; label: string } {
  const bands = config.valuation.sectorBands;
  if (sector && Object.prototype.hasOwnProperty.call(bands, sector)) {
    return { band: bands[sector], label: sector };
  }
  return { band: config.valuation.defaultBand, label: "market" };
}
