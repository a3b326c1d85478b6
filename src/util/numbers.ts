/**
 * Numeric helpers shared by the normalizer, scorers and report sections.
 */

export function pickNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.replace(/[$,\s]/g, ""));
    if (Number.isFinite(n)) return n;
  }
  return null;
}

export function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function formatLargeNumber(value: number | null): string {
  if (value == null || value === 0) return "N/A";
  const abs = Math.abs(value);
  if (abs >= 1e12) return `$${(value / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `$${(value / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `$${(value / 1e6).toFixed(2)}M`;
  return `$${Math.round(value).toLocaleString("en-US")}`;
}

export function formatNumber(value: number | null, digits = 2): string {
  return value == null ? "N/A" : value.toFixed(digits);
}

export function formatPercent(value: number | null, digits = 2): string {
  return value == null ? "N/A" : `${(value * 100).toFixed(digits)}%`;
}
