import { z } from "zod";

/**
 * Boundary schemas for the loosely shaped lists collaborators hand over.
 * Scalar indicator fields are read by the normalizer directly.
 */

const optionalNumber = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value, ctx) => {
    if (value == null || value === "") return null;
    const n = typeof value === "number" ? value : Number(value);
    if (!Number.isFinite(n)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a number, got ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    return n;
  });

export const RawSentimentSignalSchema = z.object({
  source: z.string().trim().min(1),
  polarity: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["bullish", "bearish", "neutral"])),
  note: z.string().trim().default(""),
  priceTarget: optionalNumber,
});

export const RawSentimentSignalListSchema = z.array(RawSentimentSignalSchema);

export const RawRiskFlagSchema = z.object({
  category: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["regulatory", "supply", "competitive", "macro"])),
  severity: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["low", "medium", "high", "critical"]))
    .default("medium"),
  note: z.string().default(""),
});

export const RawRiskFlagListSchema = z.array(RawRiskFlagSchema);

export const PriceHistorySchema = z
  .array(z.coerce.number().finite().positive())
  .max(5_000);

export type RawSentimentSignal = z.input<typeof RawSentimentSignalSchema>;
export type RawRiskFlag = z.input<typeof RawRiskFlagSchema>;
