import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isProduction, isTest } from "./env";

/**
 * Centralized structured logger.
 * - Local/dev: pretty-printed logs for readability
 * - Production: JSON lines for log shipping
 * - Jest: silent unless LOG_LEVEL is set explicitly
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "equity-report-engine",
    stage: getStage(),
  },
  redact: {
    paths: ["*.password", "*.secret", "*.token", "*.apiKey"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          messageKey: "message",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger carrying the ticker and run identifier of a
 * single report run.
 */
export function withRunContext(
  moduleName: string | undefined,
  run: { ticker: string; runId?: string }
): Logger {
  return getLogger(moduleName).child({
    ticker: run.ticker,
    runId: run.runId,
  });
}

export default rootLogger;
