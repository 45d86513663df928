import type { Database } from "@ticklist/shared/db";
import { errorMessage } from "@ticklist/shared/errors";
import { logger } from "@ticklist/shared/logger";
import { SCHEMA } from "./schema.js";

const log = logger.child({ module: "migrations" });

/**
 * Create the todo table, its search index and the triggers that keep them in
 * sync. Safe to run on every start.
 */
export async function initializeDatabase(db: Database): Promise<void> {
  log.debug("Initializing database schema");

  try {
    // WAL lets the CLI and a running MCP server share the file
    await db.exec("PRAGMA journal_mode=WAL");
    await db.exec("PRAGMA busy_timeout=5000");

    await db.exec(SCHEMA.todo);
    await db.exec(SCHEMA.todoCreatedIndex);
    await db.exec(SCHEMA.todoFts);
    await db.exec(SCHEMA.todoFtsInsertTrigger);
    await db.exec(SCHEMA.todoFtsDeleteTrigger);
    await db.exec(SCHEMA.todoFtsUpdateTrigger);

    log.debug("Database schema initialized");
  } catch (error) {
    log.error("Error initializing database schema", {
      error: errorMessage(error),
    });
    throw error;
  }
}
