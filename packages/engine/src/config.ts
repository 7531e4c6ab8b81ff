export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface EngineConfig {
  logLevel?: LogLevel;
  /** SQLite file receiving session history; history is off when unset. */
  dbPath?: string;
  timeoutMs?: number;
  urlPrefix?: string;
  /** Name of a registered hook run after every response. */
  afterResponseHook?: string;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    logLevel: parseLogLevel(env.SMOKE_LOG_LEVEL),
    dbPath: nonEmpty(env.SMOKE_DB_PATH),
    timeoutMs: parseTimeout(env.SMOKE_TIMEOUT_MS),
    urlPrefix: nonEmpty(env.SMOKE_URL_PREFIX),
    afterResponseHook: nonEmpty(env.SMOKE_AFTER_RESPONSE)
  };
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

function parseTimeout(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return undefined;
  }
  return Math.floor(parsed);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
