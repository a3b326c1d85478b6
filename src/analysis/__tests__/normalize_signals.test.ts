import { ValidationError } from "../domain/errors";
import { normalizeSignals } from "../normalize_signals";

describe("normalizeSignals", () => {
  it("returns an empty list when nothing is supplied", () => {
    expect(normalizeSignals(undefined)).toEqual([]);
    expect(normalizeSignals(null)).toEqual([]);
  });

  it("coerces polarity casing, price targets and notes", () => {
    const signals = normalizeSignals([
      { source: " Desk A ", polarity: "BULLISH", note: "  strong quarter ", priceTarget: "250" },
      { source: "Desk B", polarity: "neutral" },
    ]);

    expect(signals).toEqual([
      { source: "Desk A", polarity: "bullish", note: "strong quarter", priceTarget: 250 },
      { source: "Desk B", polarity: "neutral", note: "", priceTarget: null },
    ]);
  });

  it("keeps one signal per source regardless of input order", () => {
    const raw = [
      { source: "Wire C", polarity: "bullish", note: "beat" },
      { source: "desk a", polarity: "neutral", note: "hold" },
      { source: "Wire C", polarity: "bearish", note: "miss" },
    ];
    const forward = normalizeSignals(raw);
    const backward = normalizeSignals([...raw].reverse());

    expect(forward).toEqual(backward);
    expect(forward.map(s => `${s.source}:${s.polarity}`)).toEqual([
      "desk a:neutral",
      "Wire C:bearish",
    ]);
  });

  it("picks the duplicate survivor by its trimmed note", () => {
    const signals = normalizeSignals([
      { source: "Desk A", polarity: "bullish", note: "  zeta coverage" },
      { source: "Desk A", polarity: "bullish", note: "alpha coverage " },
    ]);

    expect(signals).toEqual([
      { source: "Desk A", polarity: "bullish", note: "alpha coverage", priceTarget: null },
    ]);
  });

  it("rejects an unknown polarity", () => {
    expect(() =>
      normalizeSignals([{ source: "Desk A", polarity: "ecstatic" }])
    ).toThrow(ValidationError);
  });

  it("rejects a non-numeric price target", () => {
    expect(() =>
      normalizeSignals([{ source: "Desk A", polarity: "bullish", priceTarget: "soon" }])
    ).toThrow("sentiment signals are malformed at 0.priceTarget");
  });

  it("rejects a payload that is not a list", () => {
    expect(() => normalizeSignals({ source: "Desk A" })).toThrow(ValidationError);
  });
});
