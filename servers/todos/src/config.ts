import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

const APP_NAME = "ticklist";
const DB_FILE_NAME = "todos.db";

// Unset and empty variables mean the same thing
const optionalSetting = z
  .string()
  .optional()
  .transform((value) => value || undefined);

const envSchema = z.object({
  DATABASE_URL: optionalSetting,
  XDG_DATA_HOME: optionalSetting,
});

export type TodosConfig = {
  /** Path or libsql URL of the store */
  database: string;
  /** Directory to create before opening, when the store is the default file */
  dataDir: string | null;
};

/**
 * Resolve where the todo store lives.
 *
 * `DATABASE_URL` wins; otherwise the store is
 * `$XDG_DATA_HOME/ticklist/todos.db`, falling back to `~/.local/share`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): TodosConfig {
  const parsed = envSchema.parse(env);

  if (parsed.DATABASE_URL) {
    return { database: parsed.DATABASE_URL, dataDir: null };
  }

  const xdgDataHome = parsed.XDG_DATA_HOME ?? join(homedir(), ".local", "share");
  const dataDir = join(xdgDataHome, APP_NAME);

  return { database: join(dataDir, DB_FILE_NAME), dataDir };
}
