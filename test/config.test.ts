import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { DEFAULT_TIMEOUT_MS, loadConfig } from "../src/config";
import { ReqlineError } from "../src/errors";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      sessionDir: join(homedir(), ".config", "reqline"),
      timeoutMs: DEFAULT_TIMEOUT_MS,
      logLevel: "warn",
    });
  });

  test("reads the environment", () => {
    expect(
      loadConfig({
        REQLINE_SESSION_DIR: "/tmp/sessions",
        REQLINE_TIMEOUT: "1m",
        REQLINE_LOG_LEVEL: "DEBUG",
      })
    ).toEqual({ sessionDir: "/tmp/sessions", timeoutMs: 60_000, logLevel: "debug" });
  });

  test("rejects an invalid timeout", () => {
    expect(() => loadConfig({ REQLINE_TIMEOUT: "soon" })).toThrow(
      "invalid configuration: timeoutMs: REQLINE_TIMEOUT must be a duration such as 30s"
    );
  });

  test("rejects an unknown log level with exit code 5", () => {
    let caught: unknown;
    try {
      loadConfig({ REQLINE_LOG_LEVEL: "loud" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ReqlineError);
    expect(caught instanceof ReqlineError ? caught.exitCode : undefined).toBe(5);
  });
});
