import { parseArgs } from "node:util";
import { formatTodo } from "../../services/format.js";
import { usageError, withTodoManager } from "../context.js";

const HELP = `
Usage: ticklist search <query> [options]

Full-text search over todo descriptions, best matches first.

Options:
  -l, --limit <n>    Maximum results (default 20)
  -h, --help         Show this help message

Examples:
  ticklist search milk
  ticklist search "tax return" -l 5
`;

export async function searchCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      limit: { type: "string", short: "l" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  const text = positionals.join(" ").trim();
  if (!text) {
    usageError("Search query is required", HELP);
    return;
  }

  const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    usageError(`Invalid limit '${values.limit}'`, HELP);
    return;
  }

  await withTodoManager(async (manager) => {
    const todos = await manager.search(text, { limit });

    if (todos.length === 0) {
      console.log(`No todos match '${text}'.`);
      return;
    }

    for (const todo of todos) {
      console.log(formatTodo(todo));
    }
  });
}
