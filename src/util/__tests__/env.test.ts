import {
  getBoolean,
  getEnvVar,
  getNumber,
  getStage,
  getString,
  isTest,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with APP_STAGE", () => {
    process.env.APP_STAGE = "prod";
    expect(getStage()).toBe("prod");
  });

  test("stage fallback to NODE_ENV", () => {
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("stage is test under jest", () => {
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
    process.env.NODE_ENV = "test";
    expect(getStage()).toBe("test");
    expect(isTest()).toBe(true);
  });

  test("getEnvVar returns default when missing", () => {
    const value = getEnvVar("UNKNOWN_VAR", { defaultValue: "abc" });
    expect(value).toBe("abc");
  });

  test("getEnvVar throws when required and missing", () => {
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
    process.env.NODE_ENV = "test";
    expect(() => getEnvVar("UNKNOWN_VAR", { required: true })).toThrow(
      "Missing required env var: UNKNOWN_VAR__test or UNKNOWN_VAR"
    );
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.APP_STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getEnvVar("MY_KEY")).toBe("staged");
    expect(getEnvVar("MY_KEY", { stageAware: false })).toBe("plain");
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "yes";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    expect(getBoolean("BOOL_KEY")).toBe(true);
  });

  test("parsers reject malformed values", () => {
    process.env.NUMBER_KEY = "forty";
    process.env.BOOL_KEY = "maybe";
    expect(() => getNumber("NUMBER_KEY")).toThrow("is not a number");
    expect(() => getBoolean("BOOL_KEY")).toThrow("is not a boolean");
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
  });
});
