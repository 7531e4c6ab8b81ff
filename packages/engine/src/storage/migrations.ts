import type Database from "better-sqlite3";
import { nowIso } from "../utils/time";

type Migration = {
  id: string;
  name: string;
  up: (db: Database.Database) => void;
};

const migrations: Migration[] = [
  {
    id: "0001",
    name: "sessions-and-checks",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS sessions (
          id TEXT PRIMARY KEY,
          name TEXT NOT NULL,
          status TEXT NOT NULL,
          started_at TEXT NOT NULL,
          finished_at TEXT,
          ok_count INTEGER NOT NULL DEFAULT 0,
          fail_count INTEGER NOT NULL DEFAULT 0,
          exit_code INTEGER
        );
        CREATE TABLE IF NOT EXISTS checks (
          id TEXT PRIMARY KEY,
          session_id TEXT NOT NULL,
          seq INTEGER NOT NULL,
          description TEXT NOT NULL,
          passed INTEGER NOT NULL,
          request_method TEXT,
          request_url TEXT,
          response_code TEXT,
          created_at TEXT NOT NULL,
          FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
        );
      `);
    }
  },
  {
    id: "0002",
    name: "check-lookup-indexes",
    up: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_checks_session_seq ON checks (session_id, seq);
        CREATE INDEX IF NOT EXISTS idx_sessions_started_at ON sessions (started_at);
      `);
    }
  }
];

export function migrate(db: Database.Database): string[] {
  db.exec(
    "CREATE TABLE IF NOT EXISTS schema_migrations (id TEXT PRIMARY KEY, applied_at TEXT NOT NULL)"
  );
  const appliedRows = db.prepare("SELECT id FROM schema_migrations").all() as Array<{
    id: string;
  }>;
  const applied = new Set(appliedRows.map((row) => row.id));
  const appliedNow: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    db.transaction(() => {
      migration.up(db);
      db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)")
        .run(migration.id, nowIso());
    })();
    appliedNow.push(migration.id);
  }

  return appliedNow;
}
