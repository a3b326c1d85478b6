import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { getBoolean, getNumber, getString } from "../util/env";
import { deepFreeze } from "../util/freeze";
import { getLogger } from "../util/logger";
import { RECOMMENDATION_CATEGORIES } from "./domain/types";

/**
 * Scoring configuration: weights, thresholds, override rules and the tables
 * the scorers read. Loaded once per process and frozen; runs only read it.
 */

const DEFAULT_CONFIG_PATH = path.resolve(
  __dirname,
  "../../config/scoring.json"
);

const signalGroupSchema = z.enum(["valuation", "momentum", "sentiment", "risk"]);
const perspectiveSchema = z.enum(["bullish", "bearish", "neutral"]);
const weightSchema = z.number().gt(0).max(1);
const penaltySchema = z.number().min(0).max(100);

const bandSchema = z
  .object({ cheap: z.number().positive(), expensive: z.number().positive() })
  .refine(band => band.cheap < band.expensive, {
    message: "cheap must be below expensive",
  });

const thresholdSchema = z.object({
  category: z.enum(RECOMMENDATION_CATEGORIES),
  min: z.number().min(0).max(100),
});

const overrideRuleSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  group: signalGroupSchema,
  below: z.number().min(0).max(100),
  action: z.literal("downgrade"),
});

export const ScoringConfigSchema = z.object({
  groups: z
    .array(signalGroupSchema)
    .min(1)
    .refine(groups => new Set(groups).size === groups.length, {
      message: "groups must not repeat",
    }),
  weights: z.object({
    valuation: weightSchema,
    momentum: weightSchema,
    sentiment: weightSchema,
    risk: weightSchema,
  }),
  neutralScore: z.number().min(0).max(100).default(50),
  missingDataWeightFactor: z.number().min(0).max(1).default(0.5),
  thresholds: z
    .array(thresholdSchema)
    .length(RECOMMENDATION_CATEGORIES.length)
    .superRefine((thresholds, ctx) => {
      // Highest category first, strictly descending, bottom closed at 0
      const expected = [...RECOMMENDATION_CATEGORIES].reverse();
      thresholds.forEach((t, i) => {
        if (t.category !== expected[i]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `threshold ${i} must be ${expected[i]}, got ${t.category}`,
          });
        }
        const prev = thresholds[i - 1];
        if (prev && prev.min <= t.min) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `threshold mins must strictly descend (${prev.min} <= ${t.min})`,
          });
        }
      });
      const last = thresholds[thresholds.length - 1];
      if (last && last.min !== 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "lowest threshold must start at 0",
        });
      }
    }),
  overrideRules: z.array(overrideRuleSchema).default([]),
  valuation: z.object({
    defaultBand: bandSchema,
    sectorBands: z.record(z.string(), bandSchema).default({}),
  }),
  momentum: z.object({
    blend: z.object({
      range: z.number().min(0),
      trend: z.number().min(0),
      rsi: z.number().min(0),
    }),
    rsiOverbought: z.number().min(50).max(100).default(70),
  }),
  risk: z.object({
    severityPenalties: z.object({
      low: penaltySchema,
      medium: penaltySchema,
      high: penaltySchema,
      critical: penaltySchema,
    }),
    keywordSeverity: z.enum(["low", "medium", "high", "critical"]),
    keywords: z.object({
      regulatory: z.array(z.string()),
      supply: z.array(z.string()),
      competitive: z.array(z.string()),
      macro: z.array(z.string()),
    }),
  }),
  report: z.object({
    includeVerdict: z.boolean().default(true),
    perspective: perspectiveSchema.default("neutral"),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  fetch: z.object({
    maxRetries: z.number().int().min(0).default(2),
    delayMs: z.number().min(0).default(250),
    backoffMultiplier: z.number().min(1).default(2),
  }),
});

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type InvestorPerspective = z.infer<typeof perspectiveSchema>;
export type OverrideRule = z.infer<typeof overrideRuleSchema>;
export type ValuationBand = z.infer<typeof bandSchema>;

/**
 * Validates a raw config object. Throws with every zod issue joined when the
 * shape is wrong.
 */
export function parseScoringConfig(raw: unknown): ScoringConfig {
  const parsed = ScoringConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid scoring config: ${issues}`);
  }
  return parsed.data;
}

/**
 * Reads the JSON config file, applies env overrides, validates the merged
 * result and freezes it.
 */
export function loadScoringConfig(
  options: { filePath?: string; applyEnv?: boolean } = {}
): ScoringConfig {
  const logger = getLogger("analysis/config");
  const filePath =
    options.filePath ?? getString("SCORING_CONFIG_PATH") ?? DEFAULT_CONFIG_PATH;

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  let config = parseScoringConfig(raw);

  if (options.applyEnv !== false) {
    // Overrides go through the schema like the file values do
    config = parseScoringConfig({
      ...config,
      report: {
        includeVerdict: getBoolean(
          "REPORT_INCLUDE_VERDICT",
          config.report.includeVerdict
        ),
        timeoutMs: getNumber("REPORT_TIMEOUT_MS", config.report.timeoutMs),
        perspective:
          getString("REPORT_PERSPECTIVE") || config.report.perspective,
      },
    });
  }

  logger.debug(
    { filePath, groups: config.groups, includeVerdict: config.report.includeVerdict },
    "scoring config loaded"
  );
  return deepFreeze(config);
}

let cached: ScoringConfig | undefined;

export function getScoringConfig(): ScoringConfig {
  if (!cached) cached = loadScoringConfig();
  return cached;
}
