export { type TodosConfig, loadConfig } from "./config.js";
export { openTodosDatabase } from "./db/client.js";
export { initializeDatabase } from "./db/migrations.js";
export { startServer } from "./server.js";
export * from "./services/format.js";
export { parseImportLines, readImportFiles } from "./services/import.js";
export {
  normalizePriority,
  TodoManager,
  toFtsQuery,
} from "./services/todo-manager.js";
export { type ToolResponse, ToolService } from "./services/tool-service.js";
export * from "./types/index.js";
