/**
 * Number of priority levels. Priorities live in `0..PRIORITY_LEVELS - 1` and
 * wrap around when bumped past the top.
 */
export const PRIORITY_LEVELS = 3;

export type TodoStatus = "active" | "completed";

export type Todo = {
  id: number;
  description: string;
  priority: number;
  /** Local time the todo was completed (`YYYY-MM-DD HH:MM:SS`), or null while active */
  completedAt: string | null;
};

/** Anything that identifies a todo; a full `Todo` works too. */
export type TodoRef = Pick<Todo, "id">;

export type SearchOptions = {
  limit?: number;
};
