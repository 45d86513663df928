/**
 * Single-connection database handle over libsql.
 *
 * @example
 * ```ts
 * import { Database } from "@ticklist/shared/db";
 *
 * const db = await Database.open(":memory:");
 * await db.exec("CREATE TABLE t (x INTEGER)");
 *
 * const statement = db.prepare("INSERT INTO t (x) VALUES (?)");
 * try {
 *   statement.bind(1, { type: "integer", value: 1n });
 *   await statement.step();
 * } finally {
 *   statement.finalize();
 * }
 *
 * db.close();
 * ```
 *
 * There is no internal synchronization: only one prepared statement may be
 * active at a time, and callers must finalize it before issuing another.
 */

import {
  type Client,
  createClient,
  type InValue,
  type ResultSet,
} from "@libsql/client";
import {
  BindError,
  ConnectionError,
  type DbError,
  errorMessage,
  ExecutionError,
  PrepareError,
  StepError,
} from "./errors.js";
import { logger } from "./logger.js";
import { scanSql } from "./sql/scan.js";
import {
  MAX_BIND_PARAMETERS,
  type SqlValue,
  toDriverValue,
} from "./sql/values.js";

export type { ResultSet, Row, Value } from "@libsql/client";

const log = logger.child({ module: "Database" });

// Diagnostics SQLite raises while compiling a statement, before any row is
// produced. Everything else reported during execution is a step failure.
const COMPILE_DIAGNOSTICS = [
  /near ".*": syntax error/,
  /incomplete input/,
  /unrecognized token/,
  /no such (table|column|function)/,
  /wrong number of arguments to function/,
  /\d+ values for \d+ columns/,
];

function classifyEngineError(error: unknown): DbError {
  const message = errorMessage(error);
  if (COMPILE_DIAGNOSTICS.some((pattern) => pattern.test(message))) {
    return new PrepareError(message, { cause: error });
  }
  return new StepError(message, { cause: error });
}

/**
 * Turn a filesystem path into a libsql URL. URLs and `:memory:` pass through.
 */
export function toDatabaseUrl(path: string): string {
  if (path === ":memory:" || /^(file|libsql|https?|wss?):/.test(path)) {
    return path;
  }
  return `file:${path}`;
}

type Executor = (sql: string, args: InValue[]) => Promise<ResultSet>;

/**
 * A parameterized statement bound to its connection.
 *
 * Bindings survive `step()` and `reset()`; only `clearBindings()` drops them.
 * Slots left unbound are NULL.
 */
export class PreparedStatement {
  /** Number of parameter slots in the statement text. */
  readonly parameterCount: number;
  private bindings = new Map<number, SqlValue>();
  private stepped = false;
  private isFinalized = false;

  constructor(
    readonly sql: string,
    private readonly execute: Executor,
    private readonly onFinalize: () => void,
  ) {
    this.parameterCount = scanSql(sql).parameterCount;
  }

  get finalized(): boolean {
    return this.isFinalized;
  }

  /** Attach a value to a 1-based parameter slot. */
  bind(position: number, value: SqlValue): void {
    this.assertUsable();
    if (
      !Number.isInteger(position) ||
      position < 1 ||
      position > MAX_BIND_PARAMETERS
    ) {
      throw new BindError(
        `Parameter position ${position} is outside 1..${MAX_BIND_PARAMETERS}`,
        position,
      );
    }
    if (position > this.parameterCount) {
      throw new BindError(
        `Statement has ${this.parameterCount} parameter(s); nothing to bind at position ${position}`,
        position,
      );
    }
    this.bindings.set(position, value);
  }

  clearBindings(): void {
    this.assertUsable();
    this.bindings.clear();
  }

  /**
   * Run the statement to completion with the current bindings. A statement
   * that has already run must be reset before it runs again.
   */
  async step(): Promise<ResultSet> {
    this.assertUsable();
    if (this.stepped) {
      throw new StepError("Statement must be reset before it is stepped again");
    }
    this.stepped = true;

    const args = Array.from({ length: this.parameterCount }, (_, i) => {
      const value = this.bindings.get(i + 1);
      return value ? toDriverValue(value) : null;
    });

    try {
      return await this.execute(this.sql, args);
    } catch (error) {
      throw classifyEngineError(error);
    }
  }

  reset(): void {
    this.assertUsable();
    this.stepped = false;
  }

  /** Release the statement. Safe to call more than once. */
  finalize(): void {
    if (this.isFinalized) return;
    this.isFinalized = true;
    this.bindings.clear();
    this.onFinalize();
  }

  private assertUsable(): void {
    if (this.isFinalized) {
      throw new PrepareError("Statement has already been finalized");
    }
  }
}

/**
 * Owns exactly one open connection.
 * Callers are responsible for closing it.
 */
export class Database {
  private active: PreparedStatement | null = null;

  private constructor(
    private client: Client | null,
    readonly url: string,
  ) {}

  /**
   * Open or create the store at `path` (a file path, `:memory:`, or a libsql
   * URL).
   */
  static async open(path: string): Promise<Database> {
    const url = toDatabaseUrl(path);
    let client: Client | undefined;

    try {
      client = createClient({ url, intMode: "bigint" });
      // Lazily-opened stores only fail on first use
      await client.execute("SELECT 1");
    } catch (error) {
      client?.close();
      throw new ConnectionError(
        `Cannot open database '${path}': ${errorMessage(error)}`,
        { cause: error },
      );
    }

    log.debug("Opened database", { url });
    return new Database(client, url);
  }

  get isOpen(): boolean {
    return this.client !== null;
  }

  /**
   * Execute statements that take no parameters and return no rows (DDL,
   * transaction control).
   *
   * A single statement runs on the connection as is, so `BEGIN` leaves a
   * transaction open for the statements that follow. Text holding several
   * `;`-separated statements runs as a script, which rolls back any
   * transaction still open when it finishes.
   */
  async exec(sql: string): Promise<void> {
    const client = this.connection();
    if (this.active) {
      throw new ExecutionError(
        "Cannot exec while a prepared statement is active",
      );
    }

    try {
      if (scanSql(sql).multipleStatements) {
        await client.executeMultiple(sql);
      } else {
        await client.execute(sql);
      }
    } catch (error) {
      throw new ExecutionError(errorMessage(error), { cause: error });
    }
  }

  prepare(sql: string): PreparedStatement {
    const client = this.connection();
    if (this.active) {
      throw new PrepareError(
        "Another prepared statement is still active; finalize it first",
      );
    }

    const statement = new PreparedStatement(
      sql,
      (text, args) => client.execute({ sql: text, args }),
      () => {
        if (this.active === statement) {
          this.active = null;
        }
      },
    );
    this.active = statement;
    return statement;
  }

  /** Close the connection. Further calls are no-ops. */
  close(): void {
    if (!this.client) return;

    this.active?.finalize();
    this.client.close();
    this.client = null;
    log.debug("Closed database", { url: this.url });
  }

  private connection(): Client {
    if (!this.client) {
      throw new ConnectionError("Database is closed");
    }
    return this.client;
  }
}
