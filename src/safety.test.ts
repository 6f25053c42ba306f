import { describe, it, expect } from "vitest";
import { isInsertStatement, validateQuery } from "./safety.js";

describe("validateQuery", () => {
  it("allows plain reads", () => {
    expect(validateQuery("SELECT * FROM books WHERE price > 10")).toEqual({ allowed: true });
  });

  it("allows CREATE and INSERT", () => {
    expect(validateQuery("CREATE TABLE t AS SELECT 1").allowed).toBe(true);
    expect(validateQuery("INSERT INTO t VALUES (1)").allowed).toBe(true);
  });

  it("matches case-insensitively", () => {
    expect(validateQuery("dElEtE from books")).toMatchObject({ allowed: false, keywords: ["DELETE"] });
  });

  it("blocks keywords anywhere in the text, not only the leading one", () => {
    expect(validateQuery("WITH x AS (SELECT 1) UPDATE books SET price = 0")).toMatchObject({
      allowed: false,
      keywords: ["UPDATE"],
    });
    expect(validateQuery("SELECT * FROM (SELECT 1); DROP TABLE books")).toMatchObject({
      allowed: false,
      keywords: ["DROP"],
    });
  });

  it("over-blocks keywords inside literals and comments", () => {
    expect(validateQuery("SELECT 'drop me a line' AS msg").allowed).toBe(false);
    expect(validateQuery("SELECT 1 -- TODO delete this")).toMatchObject({ allowed: false, keywords: ["DELETE"] });
  });

  it("only matches whole words", () => {
    expect(validateQuery("SELECT updated_at, deleted, dropout FROM events").allowed).toBe(true);
    expect(validateQuery("SELECT * FROM last_update").allowed).toBe(true);
  });

  it("lists every matched keyword in the reason", () => {
    expect(validateQuery("DROP TABLE a; DELETE FROM b; UPDATE c SET d = 1")).toEqual({
      allowed: false,
      keywords: ["DELETE", "DROP", "UPDATE"],
      reason: "DELETE, DROP, UPDATE blocked — DELETE, DROP and UPDATE operations are not allowed.",
    });
  });
});

describe("isInsertStatement", () => {
  it("looks at the leading keyword only", () => {
    expect(isInsertStatement("  insert into t values (1)")).toBe(true);
    expect(isInsertStatement("INSERT OR REPLACE INTO t VALUES (1)")).toBe(true);
    expect(isInsertStatement("WITH x AS (SELECT 1) INSERT INTO t SELECT * FROM x")).toBe(false);
    expect(isInsertStatement("SELECT 'INSERT'")).toBe(false);
    expect(isInsertStatement("INSERTED")).toBe(false);
  });
});
