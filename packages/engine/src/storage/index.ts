import type Database from "better-sqlite3";
import { ChecksRepo } from "./repos/checks";
import { SessionsRepo } from "./repos/sessions";

export interface StorageRepos {
  sessions: SessionsRepo;
  checks: ChecksRepo;
}

export function createRepos(db: Database.Database): StorageRepos {
  return {
    sessions: new SessionsRepo(db),
    checks: new ChecksRepo(db)
  };
}
