import { parseArgs } from "node:util";
import { formatTodo } from "../../services/format.js";
import { PRIORITY_LEVELS } from "../../types/index.js";
import { findTodo, usageError, withTodoManager } from "../context.js";

const HELP = `
Usage: ticklist add <description> [options]

Add a new todo.

Options:
  -p, --priority <n>     Priority: 0 (lowest) to ${PRIORITY_LEVELS - 1} (highest), default 0
  -h, --help             Show this help message

Examples:
  ticklist add "Fix the leaking tap"
  ticklist add "Renew passport" -p 2
`;

export async function addCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      priority: { type: "string", short: "p" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  const description = positionals.join(" ").trim();
  if (!description) {
    usageError("Description is required", HELP);
    return;
  }

  const priority = values.priority === undefined ? 0 : Number(values.priority);
  if (!Number.isInteger(priority) || priority < 0 || priority >= PRIORITY_LEVELS) {
    usageError(
      `Invalid priority '${values.priority}'. Use a whole number from 0 to ${PRIORITY_LEVELS - 1}`,
      HELP,
    );
    return;
  }

  await withTodoManager(async (manager) => {
    const id = await manager.add(description, priority);
    const todo = await findTodo(manager, id);
    console.log(`Created todo ${todo ? formatTodo(todo) : `#${id}`}`);
  });
}
