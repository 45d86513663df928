import { describe, expect, test } from "vitest";
import { scanSql } from "./scan.js";

describe("scanSql", () => {
  describe("parameterCount", () => {
    test("counts bare placeholders", () => {
      expect(scanSql("SELECT ?, ?, ?").parameterCount).toBe(3);
      expect(scanSql("SELECT 1").parameterCount).toBe(0);
    });

    test("numbered placeholders set the count to their index", () => {
      expect(scanSql("SELECT ?3").parameterCount).toBe(3);
      expect(scanSql("SELECT ?2, ?").parameterCount).toBe(3);
      expect(scanSql("SELECT ?1, ?1").parameterCount).toBe(1);
    });

    test("counts each distinct name once", () => {
      expect(scanSql("SELECT :a, @b, :a, $c").parameterCount).toBe(3);
    });

    test("skips literals, quoted identifiers and comments", () => {
      const sql = `
        SELECT '?', "?col", [?x], \`?y\`, 'it''s ?' -- ?
        /* ? :name */ FROM t WHERE a = ?
      `;
      expect(scanSql(sql).parameterCount).toBe(1);
    });

    test("does not treat $ inside an identifier as a parameter", () => {
      expect(scanSql("SELECT a$b FROM t").parameterCount).toBe(0);
    });
  });

  describe("multipleStatements", () => {
    test("a trailing semicolon is still one statement", () => {
      expect(scanSql("BEGIN").multipleStatements).toBe(false);
      expect(scanSql("COMMIT;  -- done\n").multipleStatements).toBe(false);
    });

    test("detects a second statement", () => {
      expect(
        scanSql("CREATE TABLE t (x); INSERT INTO t VALUES (1)").multipleStatements,
      ).toBe(true);
    });

    test("ignores semicolons inside literals", () => {
      expect(scanSql("SELECT ';'").multipleStatements).toBe(false);
    });

    test("trigger bodies count as several statements", () => {
      expect(
        scanSql(
          "CREATE TRIGGER a AFTER INSERT ON t BEGIN SELECT 1; END",
        ).multipleStatements,
      ).toBe(true);
    });
  });
});
