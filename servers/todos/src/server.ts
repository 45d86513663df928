import { errorMessage } from "@ticklist/shared/errors";
import { logger } from "@ticklist/shared/logger";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { openTodosDatabase } from "./db/client.js";
import { TODO_STATUSES } from "./services/format.js";
import { TodoManager } from "./services/todo-manager.js";
import { ToolService } from "./services/tool-service.js";
import { PRIORITY_LEVELS } from "./types/index.js";

const todoId = z.number().int().positive().describe("Todo id, as shown by todo_list (#id)");

export async function startServer() {
  const db = await openTodosDatabase(loadConfig());
  const manager = new TodoManager(db);
  await manager.migrate();
  await manager.listAll();

  const toolService = new ToolService(manager);

  const server = new McpServer({
    name: "ticklist",
    version: "0.1.0",
  });

  server.registerTool(
    "todo_list",
    {
      description: "List todos, oldest first",
      inputSchema: {
        status: z
          .enum(["active", "completed"])
          .optional()
          .describe(`Filter by status: ${TODO_STATUSES.join(", ")}`),
      },
    },
    async (args) => toolService.todoList({ status: args.status }),
  );

  server.registerTool(
    "todo_add",
    {
      description: "Add a todo",
      inputSchema: {
        description: z.string().min(1).describe("What needs doing"),
        priority: z
          .number()
          .int()
          .min(0)
          .max(PRIORITY_LEVELS - 1)
          .optional()
          .describe("Priority from 0 (lowest) to 2 (highest)"),
      },
    },
    async (args) =>
      toolService.todoAdd({
        description: args.description,
        priority: args.priority,
      }),
  );

  server.registerTool(
    "todo_import",
    {
      description:
        "Add many todos at once, one per line. Blank lines are skipped and the batch is all-or-nothing",
      inputSchema: {
        text: z.string().describe("Newline-separated todo descriptions"),
      },
    },
    async (args) => toolService.todoImport({ text: args.text }),
  );

  server.registerTool(
    "todo_complete",
    {
      description: "Mark a todo as completed",
      inputSchema: { id: todoId },
    },
    async (args) => toolService.todoComplete(args.id),
  );

  server.registerTool(
    "todo_uncomplete",
    {
      description: "Mark a completed todo as active again",
      inputSchema: { id: todoId },
    },
    async (args) => toolService.todoUncomplete(args.id),
  );

  server.registerTool(
    "todo_bump_priority",
    {
      description:
        "Raise a todo's priority by one level, wrapping from the highest back to the lowest",
      inputSchema: { id: todoId },
    },
    async (args) => toolService.todoBumpPriority(args.id),
  );

  server.registerTool(
    "todo_delete",
    {
      description: "Delete a todo",
      inputSchema: { id: todoId },
    },
    async (args) => toolService.todoDelete(args.id),
  );

  server.registerTool(
    "todo_search",
    {
      description: "Full-text search over todo descriptions, best matches first",
      inputSchema: {
        query: z.string().describe("Words to look for; prefixes match too"),
        limit: z.number().int().positive().optional().describe("Maximum results (default 20)"),
      },
    },
    async (args) =>
      toolService.todoSearch({ query: args.query, limit: args.limit }),
  );

  logger.info("Registered todo tools", {
    tools: [
      "todo_list",
      "todo_add",
      "todo_import",
      "todo_complete",
      "todo_uncomplete",
      "todo_bump_priority",
      "todo_delete",
      "todo_search",
    ],
  });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.close();
      manager.teardown();
      db.close();
      logger.info("Database connection closed");
    } catch (error) {
      logger.error("Error during shutdown", { error: errorMessage(error) });
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Todo MCP server running on stdio");
}
