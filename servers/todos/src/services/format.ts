import type { Todo, TodoStatus } from "../types/index.js";

export const TODO_STATUSES: readonly TodoStatus[] = ["active", "completed"];

export function isTodoStatus(value: string): value is TodoStatus {
  return TODO_STATUSES.some((status) => status === value);
}

export function isCompleted(todo: Todo): boolean {
  return todo.completedAt !== null;
}

export function filterByStatus(
  todos: readonly Todo[],
  status?: TodoStatus,
): Todo[] {
  if (!status) return [...todos];
  return todos.filter((todo) =>
    status === "completed" ? isCompleted(todo) : !isCompleted(todo),
  );
}

/** `!`, `!!` or `!!!` for priorities 0, 1 and 2. */
export function priorityLabel(priority: number): string {
  return "!".repeat(priority + 1);
}

export function formatTodo(todo: Todo): string {
  const statusIcon = isCompleted(todo) ? "[x]" : "[ ]";
  const done = todo.completedAt ? `  (done ${todo.completedAt})` : "";
  return `${statusIcon} #${todo.id} ${priorityLabel(todo.priority)} ${todo.description}${done}`;
}

export function formatTodoList(todos: readonly Todo[]): string {
  return todos.map(formatTodo).join("\n");
}
