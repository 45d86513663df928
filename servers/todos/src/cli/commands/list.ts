import { parseArgs } from "node:util";
import {
  filterByStatus,
  formatTodo,
  isTodoStatus,
  TODO_STATUSES,
} from "../../services/format.js";
import { usageError, withTodoManager } from "../context.js";

const HELP = `
Usage: ticklist list [options]

List todos, oldest first.

Options:
  -s, --status <status>      Filter by status: ${TODO_STATUSES.join(", ")}
  -h, --help                 Show this help message

Examples:
  ticklist list
  ticklist list --status active
`;

export async function listCommand(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      status: { type: "string", short: "s" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  const status = values.status;
  if (status !== undefined && !isTodoStatus(status)) {
    usageError(
      `Invalid status '${status}'. Use: ${TODO_STATUSES.join(", ")}`,
      HELP,
    );
    return;
  }

  await withTodoManager(async (manager) => {
    const todos = filterByStatus(await manager.listAll(), status);

    if (todos.length === 0) {
      console.log("No todos found.");
      return;
    }

    for (const todo of todos) {
      console.log(formatTodo(todo));
    }
  });
}
