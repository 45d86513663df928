import { parseArgs } from "node:util";
import { startServer } from "../../server.js";

const HELP = `
Usage: ticklist start

Start the todo MCP server on stdio.

Environment:
  DATABASE_URL     Store location (default: $XDG_DATA_HOME/ticklist/todos.db)
  LOG_LEVEL        debug, info, warn or error (default: info)
  LOG_FORMAT       text or json (default: text)

Options:
  -h, --help    Show this help message
`;

export async function startCommand(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  await startServer();
}
