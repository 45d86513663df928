export const SCHEMA = {
  todo: `
    CREATE TABLE IF NOT EXISTS todo (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      description TEXT NOT NULL CHECK (description <> ''),
      priority INTEGER NOT NULL DEFAULT 0,
      completed_at INTEGER,
      created_at INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `,

  todoCreatedIndex: `
    CREATE INDEX IF NOT EXISTS idx_todo_created
    ON todo(created_at, id)
  `,

  // FTS5 virtual table for keyword search (external content table linked to todo)
  todoFts: `
    CREATE VIRTUAL TABLE IF NOT EXISTS todo_fts USING fts5(
      description,
      content='todo',
      content_rowid='id'
    )
  `,

  // Triggers to keep FTS table in sync with todo table
  todoFtsInsertTrigger: `
    CREATE TRIGGER IF NOT EXISTS todo_ai AFTER INSERT ON todo BEGIN
      INSERT INTO todo_fts(rowid, description)
      VALUES (new.id, new.description);
    END
  `,

  todoFtsDeleteTrigger: `
    CREATE TRIGGER IF NOT EXISTS todo_ad AFTER DELETE ON todo BEGIN
      INSERT INTO todo_fts(todo_fts, rowid, description)
      VALUES ('delete', old.id, old.description);
    END
  `,

  // The old entry must be removed before the new one goes in; FTS5 external
  // content tables cannot be patched in place.
  todoFtsUpdateTrigger: `
    CREATE TRIGGER IF NOT EXISTS todo_au AFTER UPDATE ON todo BEGIN
      INSERT INTO todo_fts(todo_fts, rowid, description)
      VALUES ('delete', old.id, old.description);
      INSERT INTO todo_fts(rowid, description)
      VALUES (new.id, new.description);
    END
  `,
};
