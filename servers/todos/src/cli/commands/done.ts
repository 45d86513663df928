import { parseArgs } from "node:util";
import {
  findTodo,
  parseTodoId,
  usageError,
  withTodoManager,
} from "../context.js";

const HELP = `
Usage: ticklist done <id>

Mark a todo as completed.

Options:
  -h, --help    Show this help message

Examples:
  ticklist done 12
`;

export async function doneCommand(args: string[]): Promise<void> {
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

    await manager.complete(todo);
    console.log(`Completed #${id}: ${todo.description}`);
  });
}
