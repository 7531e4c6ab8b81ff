import type Database from "better-sqlite3";
import {
  NO_RESPONSE,
  type CheckRecord,
  type CheckResult
} from "../../../../shared/src/contracts";
import { newId } from "../../utils/ids";
import { nowIso } from "../../utils/time";

type CheckRow = {
  id: string;
  session_id: string;
  seq: number;
  description: string;
  passed: number;
  request_method: string | null;
  request_url: string | null;
  response_code: string | null;
  created_at: string;
};

export class ChecksRepo {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  append(sessionId: string, check: CheckResult): CheckRecord {
    const id = newId();
    const createdAt = nowIso();
    const code = check.request
      ? check.request.code === NO_RESPONSE
        ? NO_RESPONSE
        : String(check.request.code)
      : null;
    this.db
      .prepare(
        `INSERT INTO checks
        (id, session_id, seq, description, passed, request_method, request_url, response_code, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        sessionId,
        check.seq,
        check.description,
        check.passed ? 1 : 0,
        check.request?.method ?? null,
        check.request?.url ?? null,
        code,
        createdAt
      );
    return {
      id,
      session_id: sessionId,
      seq: check.seq,
      description: check.description,
      passed: check.passed,
      request_method: check.request?.method,
      request_url: check.request?.url,
      response_code: code ?? undefined,
      created_at: createdAt
    };
  }

  listBySession(sessionId: string): CheckRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM checks WHERE session_id = ? ORDER BY seq ASC")
      .all(sessionId) as CheckRow[];
    return rows.map((row) => ({
      id: row.id,
      session_id: row.session_id,
      seq: row.seq,
      description: row.description,
      passed: row.passed === 1,
      request_method: row.request_method ?? undefined,
      request_url: row.request_url ?? undefined,
      response_code: row.response_code ?? undefined,
      created_at: row.created_at
    }));
  }
}
