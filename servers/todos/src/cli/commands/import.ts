import { parseArgs } from "node:util";
import { readImportFiles } from "../../services/import.js";
import { usageError, withTodoManager } from "../context.js";

const HELP = `
Usage: ticklist import <file...>

Add one todo per non-blank line of each file. Either every line is imported
or, if any fails, none are.

Options:
  -h, --help    Show this help message

Examples:
  ticklist import groceries.txt chores.txt
`;

export async function importCommand(args: string[]): Promise<void> {
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

  if (positionals.length === 0) {
    usageError("At least one file is required", HELP);
    return;
  }

  const descriptions = await readImportFiles(positionals);

  await withTodoManager(async (manager) => {
    const count = await manager.addMany(descriptions);
    console.log(count === 1 ? "Imported 1 todo" : `Imported ${count} todos`);
  });
}
