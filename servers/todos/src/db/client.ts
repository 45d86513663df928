import { mkdirSync } from "node:fs";
import { Database } from "@ticklist/shared/db";
import type { TodosConfig } from "../config.js";

/**
 * Open the todo store described by `config`.
 * Caller is responsible for closing it.
 */
export async function openTodosDatabase(config: TodosConfig): Promise<Database> {
  if (config.dataDir) {
    mkdirSync(config.dataDir, { recursive: true });
  }

  return Database.open(config.database);
}
