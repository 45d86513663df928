import { DbError } from "@ticklist/shared/errors";
import type { Todo, TodoStatus } from "../types/index.js";
import { filterByStatus, formatTodo, formatTodoList } from "./format.js";
import { parseImportLines } from "./import.js";
import type { TodoManager } from "./todo-manager.js";

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Tool handlers for the MCP server.
 *
 * The manager sits on a single connection that takes one statement at a
 * time, so calls are queued and run one after another. The cached list is
 * refreshed after every mutation.
 */
export class ToolService {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private manager: TodoManager) {}

  private response(text: string, isError = false): ToolResponse {
    return {
      content: [{ type: "text", text }],
      ...(isError ? { isError: true } : {}),
    };
  }

  private serialize(task: () => Promise<ToolResponse>): Promise<ToolResponse> {
    const run = this.queue.then(async () => {
      try {
        return await task();
      } catch (error) {
        if (error instanceof DbError) {
          return this.response(`${error.name}: ${error.message}`, true);
        }
        throw error;
      }
    });
    // Failures reach the caller through `run`; the queue only orders calls
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async find(id: number): Promise<Todo | undefined> {
    await this.manager.listAll();
    return this.manager.todos.find((todo) => todo.id === id);
  }

  private notFound(id: number): ToolResponse {
    return this.response(`Todo #${id} not found`, true);
  }

  todoList(options: { status?: TodoStatus }): Promise<ToolResponse> {
    return this.serialize(async () => {
      const todos = filterByStatus(await this.manager.listAll(), options.status);
      if (todos.length === 0) {
        return this.response("No todos found.");
      }
      return this.response(formatTodoList(todos));
    });
  }

  todoAdd(input: { description: string; priority?: number }): Promise<ToolResponse> {
    return this.serialize(async () => {
      const id = await this.manager.add(input.description, input.priority);
      const todo = await this.find(id);
      return this.response(
        `Created todo ${todo ? formatTodo(todo) : `#${id}`}`,
      );
    });
  }

  todoImport(input: { text: string }): Promise<ToolResponse> {
    return this.serialize(async () => {
      const count = await this.manager.addMany(parseImportLines(input.text));
      await this.manager.listAll();
      return this.response(
        count === 1 ? "Imported 1 todo" : `Imported ${count} todos`,
      );
    });
  }

  todoComplete(id: number): Promise<ToolResponse> {
    return this.serialize(async () => {
      const todo = await this.find(id);
      if (!todo) return this.notFound(id);

      await this.manager.complete(todo);
      await this.manager.listAll();
      return this.response(`Completed todo #${id}`);
    });
  }

  todoUncomplete(id: number): Promise<ToolResponse> {
    return this.serialize(async () => {
      const todo = await this.find(id);
      if (!todo) return this.notFound(id);

      await this.manager.uncomplete(todo);
      await this.manager.listAll();
      return this.response(`Reopened todo #${id}`);
    });
  }

  todoBumpPriority(id: number): Promise<ToolResponse> {
    return this.serialize(async () => {
      const todo = await this.find(id);
      if (!todo) return this.notFound(id);

      await this.manager.setPriority(todo, todo.priority + 1);
      const updated = await this.find(id);
      return this.response(
        updated ? formatTodo(updated) : `Changed priority of todo #${id}`,
      );
    });
  }

  todoDelete(id: number): Promise<ToolResponse> {
    return this.serialize(async () => {
      const todo = await this.find(id);
      if (!todo) return this.notFound(id);

      await this.manager.delete(todo);
      await this.manager.listAll();
      return this.response(`Deleted todo #${id}`);
    });
  }

  todoSearch(input: { query: string; limit?: number }): Promise<ToolResponse> {
    return this.serialize(async () => {
      const todos = await this.manager.search(input.query, {
        limit: input.limit,
      });
      if (todos.length === 0) {
        return this.response(`No todos match '${input.query}'.`);
      }
      return this.response(formatTodoList(todos));
    });
  }
}
