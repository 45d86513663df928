import type { Database } from "@ticklist/shared/db";
import { errorMessage, StepError } from "@ticklist/shared/errors";
import { logger } from "@ticklist/shared/logger";
import {
  bindAll,
  integer,
  optional,
  query,
  row,
  text,
} from "@ticklist/shared/sql";
import { initializeDatabase } from "../db/migrations.js";
import {
  PRIORITY_LEVELS,
  type SearchOptions,
  type Todo,
  type TodoRef,
} from "../types/index.js";

const TODO_COLUMNS = `
  t.id,
  t.description,
  t.priority,
  datetime(t.completed_at, 'unixepoch', 'localtime')
`;

const SQL = {
  listAll: `
    SELECT ${TODO_COLUMNS}
    FROM todo t
    ORDER BY t.created_at ASC, t.id ASC
  `,
  insert: "INSERT INTO todo (description, priority) VALUES (?, ?) RETURNING id",
  insertDescription: "INSERT INTO todo (description) VALUES (?)",
  complete: "UPDATE todo SET completed_at = unixepoch() WHERE id = ?",
  uncomplete: "UPDATE todo SET completed_at = NULL WHERE id = ?",
  setPriority: "UPDATE todo SET priority = ? WHERE id = ?",
  delete: "DELETE FROM todo WHERE id = ?",
  search: `
    SELECT ${TODO_COLUMNS}
    FROM todo_fts
    JOIN todo t ON t.id = todo_fts.rowid
    WHERE todo_fts MATCH ?
    ORDER BY bm25(todo_fts), t.id
    LIMIT ?
  `,
};

const todoRow = row({
  id: integer(),
  description: text(),
  priority: integer(),
  completedAt: optional(text()),
});

const insertedRow = row({ id: integer() });

/**
 * Fold any integer into `0..PRIORITY_LEVELS - 1`, wrapping negatives too.
 */
export function normalizePriority(priority: number): number {
  const n = Math.trunc(priority);
  return ((n % PRIORITY_LEVELS) + PRIORITY_LEVELS) % PRIORITY_LEVELS;
}

/**
 * Reduce free text to FTS5 MATCH syntax: quoted prefix terms joined with OR,
 * so operators typed by the user are matched literally.
 */
export function toFtsQuery(input: string): string | null {
  const cleaned = input.replace(/["()*\-+:^]/g, " ").trim();
  const terms = cleaned.split(/\s+/).filter((t) => t.length > 0);
  if (terms.length === 0) return null;
  return terms.map((t) => `"${t}"*`).join(" OR ");
}

/**
 * Owns the todo table and an in-memory snapshot of it.
 *
 * Mutations go straight to the database and leave the snapshot alone; call
 * `listAll()` to refresh it. The connection belongs to the caller.
 */
export class TodoManager {
  private log = logger.child({ service: "TodoManager" });
  private snapshot: Todo[] = [];

  constructor(private readonly db: Database) {}

  /** The snapshot taken by the last `listAll()`. */
  get todos(): readonly Todo[] {
    return this.snapshot;
  }

  async migrate(): Promise<void> {
    await initializeDatabase(this.db);
  }

  /**
   * Drop the snapshot and reload every todo, oldest first (id breaks ties).
   */
  async listAll(): Promise<readonly Todo[]> {
    this.snapshot = [];
    this.snapshot = await query(this.db, SQL.listAll, [], todoRow);
    return this.snapshot;
  }

  /**
   * Insert one todo. The priority is normalized into range.
   * Returns the id the database assigned.
   */
  async add(description: string, priority = 0): Promise<number> {
    const [inserted] = await query(
      this.db,
      SQL.insert,
      [description, normalizePriority(priority)],
      insertedRow,
    );
    if (!inserted) {
      throw new StepError("Insert returned no id");
    }

    this.log.info("Created todo", { id: inserted.id });
    return inserted.id;
  }

  /**
   * Insert a batch of todos (priority 0) atomically: either all of them land
   * or, after a rollback, none do. One prepared statement serves the whole
   * batch. Returns the number inserted.
   */
  async addMany(descriptions: readonly string[]): Promise<number> {
    if (descriptions.length === 0) {
      return 0;
    }

    await this.db.exec("BEGIN");

    try {
      const statement = this.db.prepare(SQL.insertDescription);
      try {
        for (const description of descriptions) {
          bindAll(statement, [description]);
          await statement.step();
          statement.reset();
          statement.clearBindings();
        }
      } finally {
        statement.finalize();
      }

      await this.db.exec("COMMIT");
    } catch (error) {
      await this.rollback(error);
      throw error;
    }

    this.log.info("Imported todos", { count: descriptions.length });
    return descriptions.length;
  }

  /** Mark completed at the database's current time. */
  async complete(todo: TodoRef): Promise<void> {
    await query(this.db, SQL.complete, [todo.id]);
    this.log.info("Completed todo", { id: todo.id });
  }

  async uncomplete(todo: TodoRef): Promise<void> {
    await query(this.db, SQL.uncomplete, [todo.id]);
    this.log.info("Reopened todo", { id: todo.id });
  }

  /**
   * Store `priority` modulo {@link PRIORITY_LEVELS}. To bump, pass
   * `todo.priority + 1`.
   */
  async setPriority(todo: TodoRef, priority: number): Promise<void> {
    const normalized = normalizePriority(priority);
    await query(this.db, SQL.setPriority, [normalized, todo.id]);
    this.log.info("Changed todo priority", { id: todo.id, priority: normalized });
  }

  async delete(todo: TodoRef): Promise<void> {
    await query(this.db, SQL.delete, [todo.id]);
    this.log.info("Deleted todo", { id: todo.id });
  }

  /**
   * Full-text search over descriptions, best matches first.
   * Leaves the snapshot untouched.
   */
  async search(input: string, options?: SearchOptions): Promise<Todo[]> {
    const ftsQuery = toFtsQuery(input);
    if (!ftsQuery) return [];

    return query(
      this.db,
      SQL.search,
      [ftsQuery, options?.limit ?? 20],
      todoRow,
    );
  }

  /** Release the snapshot. The manager can be refreshed again afterwards. */
  teardown(): void {
    this.snapshot = [];
  }

  private async rollback(cause: unknown): Promise<void> {
    this.log.warn("Rolling back todo import", { error: errorMessage(cause) });
    try {
      await this.db.exec("ROLLBACK");
    } catch (error) {
      // The original failure is what the caller needs to see
      this.log.error("Rollback failed", { error: errorMessage(error) });
    }
  }
}
