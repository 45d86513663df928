import { parseArgs } from "node:util";
import { priorityLabel } from "../../services/format.js";
import { normalizePriority } from "../../services/todo-manager.js";
import {
  findTodo,
  parseTodoId,
  usageError,
  withTodoManager,
} from "../context.js";

const HELP = `
Usage: ticklist bump <id>

Raise a todo's priority by one level. The highest level wraps back to the
lowest.

Options:
  -h, --help    Show this help message
`;

export async function bumpCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  const id = parseTodoId(positionals[0]);
  if (id === null) {
    usageError("Todo id is required", HELP);
    return;
  }

  await withTodoManager(async (manager) => {
    const todo = await findTodo(manager, id);
    if (!todo) {
      throw new Error(`Todo #${id} not found`);
    }

    const priority = todo.priority + 1;
    await manager.setPriority(todo, priority);
    console.log(`#${id} is now ${priorityLabel(normalizePriority(priority))}`);
  });
}
