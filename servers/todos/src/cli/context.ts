import { loadConfig } from "../config.js";
import { openTodosDatabase } from "../db/client.js";
import { TodoManager } from "../services/todo-manager.js";
import type { Todo } from "../types/index.js";

/**
 * Open the configured store, migrate it, and hand a manager to `run`.
 * The connection is closed when `run` settles.
 */
export async function withTodoManager<T>(
  run: (manager: TodoManager) => Promise<T>,
): Promise<T> {
  const db = await openTodosDatabase(loadConfig());
  const manager = new TodoManager(db);

  try {
    await manager.migrate();
    return await run(manager);
  } finally {
    manager.teardown();
    db.close();
  }
}

/** Accepts `12` or `#12`. */
export function parseTodoId(value: string | undefined): number | null {
  if (!value) return null;
  const id = Number(value.replace(/^#/, ""));
  return Number.isInteger(id) && id > 0 ? id : null;
}

export async function findTodo(
  manager: TodoManager,
  id: number,
): Promise<Todo | undefined> {
  const todos = await manager.listAll();
  return todos.find((todo) => todo.id === id);
}

/** Print a usage error. The process exits with status 1 once it unwinds. */
export function usageError(message: string, help: string): void {
  console.error(`Error: ${message}`);
  console.log(help);
  process.exitCode = 1;
}
