import type { SessionEvent } from "../../../shared/src/contracts";
import { Logger } from "../logger";
import type { SmokeSession } from "../session/session";
import type { StorageRepos } from "./index";

/** Mirrors a session's checks and final tally into the history tables. */
export class HistoryRecorder {
  private readonly repos: StorageRepos;
  private readonly logger: Logger;

  constructor(repos: StorageRepos, logger: Logger) {
    this.repos = repos;
    this.logger = logger;
  }

  attach(session: SmokeSession): () => void {
    this.repos.sessions.create({ id: session.id, name: session.name });
    return session.subscribe((event) => this.handle(event));
  }

  private handle(event: SessionEvent): void {
    switch (event.type) {
      case "CHECK_RECORDED":
        this.repos.checks.append(event.session_id, event.check);
        break;
      case "SESSION_REPORTED":
        this.repos.sessions.finish(event.session_id, event.summary);
        this.logger.debug("Session history recorded", {
          session_id: event.session_id,
          ok: event.summary.ok_count,
          failed: event.summary.fail_count
        });
        break;
      default:
        break;
    }
  }
}
