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
Usage: ticklist priority <id> <n>

Set a todo's priority. Values wrap modulo the number of levels, so 3 is 0
and -1 is 2. Put -- before a negative value.

Options:
  -h, --help    Show this help message

Examples:
  ticklist priority 12 2
  ticklist priority 12 -- -1
`;

export async function priorityCommand(args: string[]): Promise<void> {
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

  const priority = Number(positionals[1]);
  if (positionals[1] === undefined || !Number.isInteger(priority)) {
    usageError("Priority must be a whole number", HELP);
    return;
  }

  await withTodoManager(async (manager) => {
    const todo = await findTodo(manager, id);
    if (!todo) {
      throw new Error(`Todo #${id} not found`);
    }

    await manager.setPriority(todo, priority);
    console.log(`#${id} is now ${priorityLabel(normalizePriority(priority))}`);
  });
}
