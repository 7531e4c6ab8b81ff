import type { SmokeConfig } from "../../shared/src/contracts";
import { loadEngineConfig, type EngineConfig } from "./config";
import { Logger } from "./logger";
import { SmokeSession, type SmokeSessionOptions } from "./session/session";
import { HistoryRecorder } from "./storage/recorder";
import { openDatabase } from "./storage/db";
import { createRepos } from "./storage";

export { SmokeSession } from "./session/session";
export type { SmokeSessionOptions } from "./session/session";
export { ConfigStore } from "./session/config-store";
export { CSRF_PLACEHOLDER, renderCsrfTemplate } from "./session/csrf";
export { HookRegistry, csrfTokenExtractor } from "./session/hooks";
export type { AfterResponseHook } from "./session/hooks";
export { BufferedOutput, consoleOutput } from "./session/output";
export type { SmokeOutput } from "./session/output";
export { AxiosTransport } from "./session/transport";
export type { HttpTransport, TransportRequest, TransportResponse } from "./session/transport";
export { applyPlanConfig, loadPlanFile, runPlan } from "./plan/runner";
export { Logger } from "./logger";
export { loadEngineConfig } from "./config";
export type { EngineConfig, LogLevel } from "./config";
export * from "./errors";
export { NO_RESPONSE } from "../../shared/src/contracts";
export type { LastResponse, ReportSummary, SmokeConfig } from "../../shared/src/contracts";

export interface CreateSessionOptions extends SmokeSessionOptions {
  engineConfig?: EngineConfig;
}

/**
 * Builds a session from environment config (`SMOKE_*` variables) merged with
 * explicit options. With a database path the session's checks are recorded
 * and the database closes once the session reports.
 */
export function createSession(options: CreateSessionOptions = {}): SmokeSession {
  const { engineConfig = loadEngineConfig(), ...sessionOptions } = options;
  const logger = sessionOptions.logger ?? new Logger(engineConfig.logLevel ?? "warn");

  const config: Partial<SmokeConfig> = {};
  if (engineConfig.urlPrefix) {
    config.url_prefix = engineConfig.urlPrefix;
  }
  if (engineConfig.timeoutMs) {
    config.timeout_ms = engineConfig.timeoutMs;
  }

  const session = new SmokeSession({
    ...sessionOptions,
    logger,
    config: { ...config, ...sessionOptions.config },
    afterResponse: sessionOptions.afterResponse ?? engineConfig.afterResponseHook
  });

  if (engineConfig.dbPath) {
    const db = openDatabase(engineConfig.dbPath, logger);
    const detach = new HistoryRecorder(createRepos(db), logger).attach(session);
    const unsubscribe = session.subscribe((event) => {
      if (event.type === "SESSION_REPORTED") {
        detach();
        unsubscribe();
        db.close();
      }
    });
  }

  return session;
}
