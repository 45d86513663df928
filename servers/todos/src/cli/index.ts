#!/usr/bin/env tsx

/**
 * ticklist - todo list on a local SQLite store
 *
 * Usage:
 *   ticklist <command> [options]
 *   ticklist <description>       # Quick add a todo
 */

import { errorMessage } from "@ticklist/shared/errors";
import { addCommand } from "./commands/add.js";
import { bumpCommand } from "./commands/bump.js";
import { deleteCommand } from "./commands/delete.js";
import { doneCommand } from "./commands/done.js";
import { importCommand } from "./commands/import.js";
import { listCommand } from "./commands/list.js";
import { priorityCommand } from "./commands/priority.js";
import { searchCommand } from "./commands/search.js";
import { startCommand } from "./commands/start.js";
import { undoCommand } from "./commands/undo.js";

const COMMANDS = new Set([
  "start",
  "add",
  "list",
  "ls",
  "done",
  "undo",
  "bump",
  "priority",
  "delete",
  "rm",
  "import",
  "search",
]);

const HELP_TEXT = `
ticklist - todo list on a local SQLite store

Usage:
  ticklist <description>   Quick add a todo
  ticklist <command>       Run a command

Commands:
  start                  Start the MCP server
  add <description>      Add a new todo (with options)
  list                   List todos, oldest first
  done <id>              Mark a todo as completed
  undo <id>              Mark a todo as active again
  bump <id>              Raise a todo's priority, wrapping at the top
  priority <id> <n>      Set a todo's priority
  delete <id>            Delete a todo
  import <file...>       Add one todo per line of each file
  search <query>         Full-text search

Examples:
  ticklist Buy milk, eggs, and butter
  ticklist add "Fix the leaking tap" -p 2
  ticklist list --status active
  ticklist done 3

Run 'ticklist <command> --help' for more information on a command.
`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(HELP_TEXT);
    return;
  }

  // If first arg is not a known command, treat entire input as a quick add
  if (!COMMANDS.has(command)) {
    await addCommand([args.join(" ")]);
    return;
  }

  const rest = args.slice(1);
  switch (command) {
    case "start":
      await startCommand(rest);
      break;
    case "add":
      await addCommand(rest);
      break;
    case "list":
    case "ls":
      await listCommand(rest);
      break;
    case "done":
      await doneCommand(rest);
      break;
    case "undo":
      await undoCommand(rest);
      break;
    case "bump":
      await bumpCommand(rest);
      break;
    case "priority":
      await priorityCommand(rest);
      break;
    case "delete":
    case "rm":
      await deleteCommand(rest);
      break;
    case "import":
      await importCommand(rest);
      break;
    case "search":
      await searchCommand(rest);
      break;
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
