import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Database, toDatabaseUrl } from "./db.js";
import {
  BindError,
  ConnectionError,
  ExecutionError,
  PrepareError,
  StepError,
} from "./errors.js";
import { integer, row } from "./sql/columns.js";
import { query } from "./sql/query.js";

const countRow = row({ count: integer() });

describe("toDatabaseUrl", () => {
  test("prefixes plain paths with file:", () => {
    expect(toDatabaseUrl("todos.db")).toBe("file:todos.db");
    expect(toDatabaseUrl("/var/data/todos.db")).toBe("file:/var/data/todos.db");
  });

  test("passes URLs and :memory: through", () => {
    expect(toDatabaseUrl(":memory:")).toBe(":memory:");
    expect(toDatabaseUrl("file:/tmp/a.db")).toBe("file:/tmp/a.db");
    expect(toDatabaseUrl("libsql://example.turso.io")).toBe(
      "libsql://example.turso.io",
    );
  });
});

describe("Database", () => {
  describe("open", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "ticklist-db-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test("creates a file-backed store that survives reopening", async () => {
      const path = join(dir, "todos.db");

      const first = await Database.open(path);
      await first.exec(
        "CREATE TABLE t (x INTEGER); INSERT INTO t VALUES (1), (2);",
      );
      first.close();

      const second = await Database.open(path);
      const [result] = await query(
        second,
        "SELECT count(*) FROM t",
        [],
        countRow,
      );
      second.close();

      expect(result).toEqual({ count: 2 });
    });

    test("fails with ConnectionError when the store cannot be created", async () => {
      const path = join(dir, "missing", "nested", "todos.db");
      await expect(Database.open(path)).rejects.toBeInstanceOf(
        ConnectionError,
      );
    });
  });

  describe("lifecycle", () => {
    let db: Database;

    beforeEach(async () => {
      db = await Database.open(":memory:");
    });

    afterEach(() => {
      db.close();
    });

    test("close is idempotent", () => {
      expect(db.isOpen).toBe(true);
      db.close();
      db.close();
      expect(db.isOpen).toBe(false);
    });

    test("rejects use after close", async () => {
      db.close();
      await expect(db.exec("SELECT 1")).rejects.toBeInstanceOf(
        ConnectionError,
      );
      expect(() => db.prepare("SELECT 1")).toThrow("Database is closed");
    });

    test("BEGIN leaves a transaction open until COMMIT", async () => {
      await db.exec("CREATE TABLE t (x INTEGER)");

      await db.exec("BEGIN");
      await expect(db.exec("BEGIN")).rejects.toThrow(
        /within a transaction/,
      );
      await query(db, "INSERT INTO t (x) VALUES (?)", [1]);
      await db.exec("COMMIT");

      const [result] = await query(db, "SELECT count(*) FROM t", [], countRow);
      expect(result).toEqual({ count: 1 });
    });

    test("ROLLBACK discards the open transaction", async () => {
      await db.exec("CREATE TABLE t (x INTEGER)");

      await db.exec("BEGIN");
      await query(db, "INSERT INTO t (x) VALUES (?)", [1]);
      await db.exec("ROLLBACK");

      const [result] = await query(db, "SELECT count(*) FROM t", [], countRow);
      expect(result).toEqual({ count: 0 });
      await expect(db.exec("COMMIT")).rejects.toBeInstanceOf(ExecutionError);
    });

    test("runs several statements as a script", async () => {
      await db.exec("CREATE TABLE t (x INTEGER); INSERT INTO t VALUES (7)");

      const [result] = await query(db, "SELECT x AS count FROM t", [], countRow);
      expect(result).toEqual({ count: 7 });
    });

    test("exec reports engine diagnostics", async () => {
      await expect(db.exec("CREATE TABLE")).rejects.toBeInstanceOf(
        ExecutionError,
      );
    });
  });

  describe("prepared statements", () => {
    let db: Database;

    beforeEach(async () => {
      db = await Database.open(":memory:");
      await db.exec("CREATE TABLE t (x INTEGER)");
    });

    afterEach(() => {
      db.close();
    });

    test("allows one active statement at a time", async () => {
      const statement = db.prepare("SELECT 1");

      expect(() => db.prepare("SELECT 2")).toThrow(PrepareError);
      await expect(db.exec("SELECT 1")).rejects.toBeInstanceOf(ExecutionError);

      statement.finalize();
      expect(statement.finalized).toBe(true);
      expect(() => db.prepare("SELECT 2").finalize()).not.toThrow();
    });

    test("must be reset before stepping again", async () => {
      const statement = db.prepare("INSERT INTO t (x) VALUES (?)");
      try {
        statement.bind(1, { type: "integer", value: 1n });
        await statement.step();
        await expect(statement.step()).rejects.toBeInstanceOf(StepError);

        // Bindings survive a reset
        statement.reset();
        await statement.step();

        statement.reset();
        statement.clearBindings();
        statement.bind(1, { type: "integer", value: 5n });
        await statement.step();
      } finally {
        statement.finalize();
      }

      const rows = await query(
        db,
        "SELECT x AS count FROM t ORDER BY rowid",
        [],
        countRow,
      );
      expect(rows).toEqual([{ count: 1 }, { count: 1 }, { count: 5 }]);
    });

    test("reports the statement's parameter count", () => {
      const statement = db.prepare("INSERT INTO t (x) VALUES (?)");
      try {
        expect(statement.parameterCount).toBe(1);
        expect(() => statement.bind(2, { type: "null" })).toThrow(BindError);
      } finally {
        statement.finalize();
      }
    });

    test("cannot be used after finalize", () => {
      const statement = db.prepare("SELECT ?");
      statement.finalize();
      statement.finalize();
      expect(() => statement.bind(1, { type: "null" })).toThrow(
        "Statement has already been finalized",
      );
    });
  });
});
