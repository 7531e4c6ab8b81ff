import type Database from "better-sqlite3";
import type {
  ReportSummary,
  SessionRecord,
  SessionStatus
} from "../../../../shared/src/contracts";
import { nowIso } from "../../utils/time";

type SessionRow = {
  id: string;
  name: string;
  status: string;
  started_at: string;
  finished_at: string | null;
  ok_count: number;
  fail_count: number;
  exit_code: number | null;
};

export class SessionsRepo {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  create(input: { id: string; name: string }): SessionRecord {
    const startedAt = nowIso();
    this.db
      .prepare(
        "INSERT INTO sessions (id, name, status, started_at, ok_count, fail_count) VALUES (?, ?, 'running', ?, 0, 0)"
      )
      .run(input.id, input.name, startedAt);
    return {
      id: input.id,
      name: input.name,
      status: "running",
      started_at: startedAt,
      ok_count: 0,
      fail_count: 0
    };
  }

  finish(sessionId: string, summary: ReportSummary): SessionRecord | null {
    const status: SessionStatus = summary.exit_code === 0 ? "passed" : "failed";
    this.db
      .prepare(
        "UPDATE sessions SET status = ?, finished_at = ?, ok_count = ?, fail_count = ?, exit_code = ? WHERE id = ?"
      )
      .run(status, nowIso(), summary.ok_count, summary.fail_count, summary.exit_code, sessionId);
    return this.getById(sessionId);
  }

  getById(sessionId: string): SessionRecord | null {
    const row = this.db
      .prepare("SELECT * FROM sessions WHERE id = ?")
      .get(sessionId) as SessionRow | undefined;
    return row ? this.toSession(row) : null;
  }

  listRecent(limit = 20): SessionRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM sessions ORDER BY started_at DESC, rowid DESC LIMIT ?")
      .all(limit) as SessionRow[];
    return rows.map((row) => this.toSession(row));
  }

  private toSession(row: SessionRow): SessionRecord {
    return {
      id: row.id,
      name: row.name,
      status: row.status as SessionStatus,
      started_at: row.started_at,
      finished_at: row.finished_at ?? undefined,
      ok_count: row.ok_count,
      fail_count: row.fail_count,
      exit_code: row.exit_code ?? undefined
    };
  }
}
