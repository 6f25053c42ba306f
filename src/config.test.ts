import { describe, it, expect } from "vitest";
import { BOOTSTRAP_DATABASE, expandEnv, resolveConfig, resolvePath } from "./config.js";

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveConfig(undefined, {})).toEqual({
      databasePath: BOOTSTRAP_DATABASE,
      bootstrapPath: BOOTSTRAP_DATABASE,
      queryTimeout: 60_000,
      maxRows: 1000,
      logLevel: "info",
    });
  });

  it("reads overrides from the environment", () => {
    const cfg = resolveConfig(undefined, {
      DUCKDB_GATEWAY_DB: "/data/app.duckdb",
      DUCKDB_GATEWAY_TIMEOUT: "2500",
      LOG_LEVEL: "DEBUG",
    });
    expect(cfg.databasePath).toBe("/data/app.duckdb");
    expect(cfg.queryTimeout).toBe(2500);
    expect(cfg.logLevel).toBe("debug");
  });

  it("prefers explicit values over the environment", () => {
    const cfg = resolveConfig({ databasePath: "/explicit.duckdb", queryTimeout: 10 }, { DUCKDB_GATEWAY_DB: "/env.duckdb" });
    expect(cfg.databasePath).toBe("/explicit.duckdb");
    expect(cfg.queryTimeout).toBe(10);
  });

  it("caps maxRows", () => {
    expect(resolveConfig({ maxRows: 50_000 }, {}).maxRows).toBe(10_000);
  });

  it("rejects non-positive timeouts", () => {
    expect(() => resolveConfig({ queryTimeout: 0 }, {})).toThrow(
      "queryTimeout must be a positive number of milliseconds, got 0",
    );
    expect(() => resolveConfig(undefined, { DUCKDB_GATEWAY_TIMEOUT: "soon" })).toThrow(
      'DUCKDB_GATEWAY_TIMEOUT must be a number of milliseconds, got "soon"',
    );
  });

  it("ignores unknown log levels", () => {
    expect(resolveConfig(undefined, { LOG_LEVEL: "loud" }).logLevel).toBe("info");
  });
});

describe("path expansion", () => {
  it("expands env references and the home directory", () => {
    const env = { HOME: "/home/tester", DATA_DIR: "/srv/data" };
    expect(expandEnv("$DATA_DIR/app.duckdb", env)).toBe("/srv/data/app.duckdb");
    expect(resolvePath("~/db/app.duckdb", env)).toBe("/home/tester/db/app.duckdb");
  });

  it("throws on unset variables", () => {
    expect(() => expandEnv("$MISSING/app.duckdb", {})).toThrow(
      "Environment variable $MISSING is not set. Set it before connecting.",
    );
  });
});
