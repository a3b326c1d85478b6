import { ValidationError } from "../domain/errors";
import { normalizeIndicators, normalizeTicker } from "../normalize_indicators";

const AS_OF = "2025-01-15T21:00:00.000Z";

describe("normalizeIndicators", () => {
  it("maps provider aliases and keeps absent optionals as null", () => {
    const record = normalizeIndicators(
      {
        regularMarketPrice: "$1,234.50",
        marketCap: 2_000_000_000,
        trailingPE: 22.4,
        shortName: "  Example Corp ",
        movingAverages: { ma50: 1200, ma200: 1100 },
        pegRatio: "",
      },
      " exm ",
      { asOf: AS_OF }
    );

    expect(record.ticker).toBe("EXM");
    expect(record.price).toBe(1234.5);
    expect(record.trailingPe).toBe(22.4);
    expect(record.companyName).toBe("Example Corp");
    expect(record.movingAverages).toEqual({ ma50: 1200, ma200: 1100 });
    expect(record.pegRatio).toBeNull();
    expect(record.forwardPe).toBeNull();
    expect(record.fiftyTwoWeekLow).toBeNull();
    expect(record.rsi).toBeNull();
    expect(record.sector).toBeNull();
    expect(record.riskFlags).toBeNull();
    expect(record.history).toBeNull();
    expect(record.asOf).toBe(AS_OF);
  });

  it("prefers the payload timestamp over the fallback", () => {
    const record = normalizeIndicators(
      { price: 10, marketCap: 1e6, timestamp: "2024-06-01T00:00:00Z" },
      "ABC",
      { asOf: AS_OF }
    );
    expect(record.asOf).toBe("2024-06-01T00:00:00.000Z");
  });

  it("tags reported risk flags and fills default severity", () => {
    const record = normalizeIndicators(
      {
        price: 10,
        marketCap: 1e6,
        risks: [{ category: "supply", note: "single foundry" }],
      },
      "ABC",
      { asOf: AS_OF }
    );
    expect(record.riskFlags).toEqual([
      {
        category: "supply",
        severity: "medium",
        note: "single foundry",
        origin: "reported",
      },
    ]);
  });

  it("keeps an explicit empty risk list distinct from a missing one", () => {
    const record = normalizeIndicators(
      { price: 10, marketCap: 1e6, riskFlags: [] },
      "ABC",
      { asOf: AS_OF }
    );
    expect(record.riskFlags).toEqual([]);
  });

  it("summarizes price history when closes are supplied", () => {
    const record = normalizeIndicators(
      { price: 99, marketCap: 1e6, closes: [100, 110, 99] },
      "ABC",
      { asOf: AS_OF }
    );
    expect(record.history?.sessions).toBe(3);
    expect(record.history?.maxDrawdown).toBeCloseTo(-0.1, 10);
  });

  it.each([
    [{ marketCap: 1e6 }, "price is required"],
    [{ price: 0, marketCap: 1e6 }, "price must be positive, got 0"],
    [{ price: "abc", marketCap: 1e6 }, 'price must be numeric, got "abc"'],
    [{ price: 10 }, "marketCap is required"],
    [{ price: 10, marketCap: 1e6, rsi: 120 }, "rsi must be within [0, 100], got 120"],
    [{ price: 10, marketCap: 1e6, beta: "high" }, 'beta must be numeric when present, got "high"'],
    [
      { price: 10, marketCap: 1e6, fiftyTwoWeekLow: 20, fiftyTwoWeekHigh: 15 },
      "52-week low 20 is above 52-week high 15",
    ],
    [{ price: 10, marketCap: 1e6, timestamp: "not a date" }, 'timestamp is not a valid date: "not a date"'],
  ])("rejects %j", (raw, message) => {
    expect(() => normalizeIndicators(raw, "ABC", { asOf: AS_OF })).toThrow(message);
  });

  it("raises ValidationError with the offending field", () => {
    try {
      normalizeIndicators({ price: 10, marketCap: -5 }, "ABC");
      throw new Error("expected a validation failure");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: "marketCap", code: "VALIDATION" });
    }
  });

  it("requires a ticker", () => {
    expect(() => normalizeIndicators({ price: 10, marketCap: 1e6 }, "  ")).toThrow(
      "ticker is required"
    );
  });
});

describe("normalizeTicker", () => {
  it("trims and upper-cases", () => {
    expect(normalizeTicker(" brk.b ")).toBe("BRK.B");
    expect(normalizeTicker(undefined)).toBe("");
  });
});
