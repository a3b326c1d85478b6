export * from "./analysis/aggregate_scores";
export * from "./analysis/config";
export * from "./analysis/domain/errors";
export * from "./analysis/domain/types";
export * from "./analysis/map_recommendation";
export * from "./analysis/normalize_indicators";
export * from "./analysis/normalize_signals";
export * from "./analysis/price_history";
export * from "./analysis/scorers";
export * from "./reporting/business/assemble_report";
export * from "./reporting/business/generate_report";
export * from "./reporting/business/run_report_batch";
export * from "./reporting/domain/types";
export * from "./reporting/infrastructure/contracts";
export * from "./reporting/infrastructure/snapshot_provider";
