/**
 * Environment utilities for stage detection and typed env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Explicit APP_STAGE/STAGE wins; otherwise derive from NODE_ENV
  const explicit = process.env.APP_STAGE || process.env.STAGE;
  if (explicit && explicit.length > 0) return explicit;
  const nodeEnv = getNodeEnv();
  if (nodeEnv === "production") return "prod";
  if (nodeEnv === "test") return "test";
  return "dev";
}

export function isProduction(): boolean {
  return getStage() === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || process.env.JEST_WORKER_ID !== undefined;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse?: (raw: string) => T;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads an environment variable with stage-aware lookup and optional parsing.
 * - Checks NAME__<stage> first (e.g. REPORT_TIMEOUT_MS__prod), then NAME,
 *   unless `stageAware` is false.
 * - When nothing is set, returns `defaultValue` if given, throws when
 *   `required`, and returns undefined otherwise.
 */
export function getEnvVar<T = string>(
  name: string,
  options: GetEnvVarOptions<T> & { parse: (raw: string) => T }
): T | undefined;
export function getEnvVar(
  name: string,
  options?: GetEnvVarOptions<string>
): string | undefined;
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> = {}
): T | string | undefined {
  const stage = getStage();
  const stageKey = `${name}__${stage}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") {
    return options.parse ? options.parse(candidate) : candidate;
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function getString(name: string): string | undefined;
export function getString(name: string, defaultValue: string): string;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue });
}

export function getNumber(name: string): number | undefined;
export function getNumber(name: string, defaultValue: number): number;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar<number>(name, {
    defaultValue,
    parse: raw => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
}

export function getBoolean(name: string): boolean | undefined;
export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar<boolean>(name, {
    defaultValue,
    parse: raw => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
}
