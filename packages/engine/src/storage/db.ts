import Database from "better-sqlite3";
import { Logger } from "../logger";
import { migrate } from "./migrations";

export function openDatabase(dbPath: string, logger: Logger): Database.Database {
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");

  const applied = migrate(db);
  if (applied.length > 0) {
    logger.info("History migrations applied", { applied });
  }

  logger.debug("History database opened", { dbPath });
  return db;
}
