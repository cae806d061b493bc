import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

const MIGRATIONS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "migrations");

export type OpenedDatabase = {
  sqlite: Database.Database;
  db: BetterSQLite3Database;
  close(): void;
};

export type OpenDatabaseOptions = {
  /**
   * Hold the file lock for the life of the connection so no other process
   * can write to the store. Ignored for in-memory databases.
   */
  exclusive?: boolean;
  migrationsDir?: string;
};

function applyMigrations(sqlite: Database.Database, migrationsDir: string): string[] {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  const applied = new Set(
    sqlite
      .prepare("SELECT filename FROM schema_migrations")
      .all()
      .map((row) => (row as { filename: string }).filename),
  );

  const pending = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql") && !applied.has(file))
    .sort();

  const record = sqlite.prepare("INSERT INTO schema_migrations (filename, applied_at) VALUES (?, ?)");
  for (const file of pending) {
    const statements = fs.readFileSync(path.join(migrationsDir, file), "utf-8");
    sqlite.transaction(() => {
      sqlite.exec(statements);
      record.run(file, Date.now());
    })();
    console.log(`[store] Applied migration ${file}`);
  }
  return pending;
}

export function openDatabase(dbPath: string, opts: OpenDatabaseOptions = {}): OpenedDatabase {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  if (opts.exclusive && !inMemory) {
    sqlite.pragma("locking_mode = EXCLUSIVE");
  }
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.pragma("synchronous = NORMAL");
  sqlite.pragma("foreign_keys = ON");

  applyMigrations(sqlite, opts.migrationsDir ?? MIGRATIONS_DIR);

  return {
    sqlite,
    db: drizzle(sqlite),
    close: () => sqlite.close(),
  };
}
