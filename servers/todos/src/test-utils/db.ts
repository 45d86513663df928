/**
 * Test fixture backed by an in-memory database.
 */

import { Database } from "@ticklist/shared/db";
import { TodoManager } from "../services/todo-manager.js";

export class TestFixture {
  constructor(
    readonly db: Database,
    readonly manager: TodoManager,
  ) {}

  static async create(): Promise<TestFixture> {
    const db = await Database.open(":memory:");
    const manager = new TodoManager(db);
    await manager.migrate();
    return new TestFixture(db, manager);
  }

  /**
   * A migrated store holding three active todos, created in this order.
   */
  static async createSeeded(): Promise<TestFixture> {
    const fixture = await TestFixture.create();
    await seedTodos(fixture.manager);
    return fixture;
  }

  cleanup(): void {
    this.manager.teardown();
    this.db.close();
  }
}

export const SEED_TODOS = [
  { description: "buy milk", priority: 0 },
  { description: "walk dog", priority: 1 },
  { description: "file taxes", priority: 2 },
] as const;

export async function seedTodos(manager: TodoManager): Promise<number[]> {
  const ids: number[] = [];
  for (const todo of SEED_TODOS) {
    ids.push(await manager.add(todo.description, todo.priority));
  }
  return ids;
}
