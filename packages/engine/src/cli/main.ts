#!/usr/bin/env node
import path from "path";
import type { SmokePlan } from "../../../core/src/plan";
import { loadEngineConfig, parseLogLevel, type EngineConfig } from "../config";
import { PlanValidationError } from "../errors";
import { createSession } from "../index";
import { Logger } from "../logger";
import { loadPlanFile, runPlan } from "../plan/runner";
import { consoleOutput, type SmokeOutput } from "../session/output";
import { openDatabase } from "../storage/db";
import { createRepos } from "../storage";

export const EXIT_USAGE = 2;

type Args = {
  command?: string;
  target?: string;
  db?: string;
  debug: boolean;
  logLevel?: string;
  limit?: number;
};

export interface CliOptions {
  output?: SmokeOutput;
  env?: NodeJS.ProcessEnv;
}

export async function main(argv: string[], options: CliOptions = {}): Promise<number> {
  const output = options.output ?? consoleOutput;
  const args = parseArgs(argv);
  const engineConfig = loadEngineConfig(options.env ?? process.env);
  if (args.db) {
    engineConfig.dbPath = args.db;
  }
  if (args.logLevel) {
    engineConfig.logLevel = parseLogLevel(args.logLevel) ?? engineConfig.logLevel;
  }

  switch (args.command) {
    case "run":
      if (!args.target) {
        printUsage(output);
        return EXIT_USAGE;
      }
      return runCommand(args.target, args.debug, engineConfig, output);
    case "history":
      return historyCommand(engineConfig, args.limit ?? 20, output);
    default:
      printUsage(output);
      return EXIT_USAGE;
  }
}

async function runCommand(
  planPath: string,
  debug: boolean,
  engineConfig: EngineConfig,
  output: SmokeOutput
): Promise<number> {
  const resolved = path.resolve(planPath);
  let plan: SmokePlan;
  try {
    plan = loadPlanFile(resolved);
  } catch (error) {
    if (error instanceof PlanValidationError) {
      output.diagnostic(`Invalid plan ${resolved}:`);
      for (const message of error.errors) {
        output.diagnostic(`  ${message}`);
      }
    } else {
      const message = error instanceof Error ? error.message : "unknown error";
      output.diagnostic(`Cannot read plan: ${message}`);
    }
    return EXIT_USAGE;
  }

  if (engineConfig.afterResponseHook) {
    // Plans carry their own csrf extractor; the CLI has no registered hooks.
    new Logger(engineConfig.logLevel ?? "warn").warn("Ignoring SMOKE_AFTER_RESPONSE for plan runs", {
      hook: engineConfig.afterResponseHook
    });
    engineConfig.afterResponseHook = undefined;
  }

  const session = createSession({
    name: plan.name ?? path.basename(resolved, path.extname(resolved)),
    engineConfig,
    output
  });
  if (debug) {
    session.config.setDebug(true);
  }
  return runPlan(session, plan, { baseDir: path.dirname(resolved) });
}

function historyCommand(engineConfig: EngineConfig, limit: number, output: SmokeOutput): number {
  if (!engineConfig.dbPath) {
    output.diagnostic("history needs --db <path> or SMOKE_DB_PATH");
    return EXIT_USAGE;
  }
  const logger = new Logger(engineConfig.logLevel ?? "warn");
  const db = openDatabase(engineConfig.dbPath, logger);
  try {
    const sessions = createRepos(db).sessions.listRecent(limit);
    const header =
      "Started".padEnd(26) + "Name".padEnd(24) + "Status".padEnd(10) + "Checks";
    output.line(header);
    output.line("-".repeat(header.length));
    for (const session of sessions) {
      const total = session.ok_count + session.fail_count;
      output.line(
        session.started_at.padEnd(26) +
          session.name.padEnd(24) +
          session.status.padEnd(10) +
          `${session.ok_count}/${total}`
      );
    }
  } finally {
    db.close();
  }
  return 0;
}

function parseArgs(argv: string[]): Args {
  const parsed: Args = { debug: false };
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const value = argv[i];
    if (value === "--db") {
      parsed.db = argv[i + 1];
      i += 1;
    } else if (value === "--log-level") {
      parsed.logLevel = argv[i + 1];
      i += 1;
    } else if (value === "--limit") {
      const limit = Number(argv[i + 1]);
      parsed.limit = Number.isInteger(limit) && limit > 0 ? limit : undefined;
      i += 1;
    } else if (value === "--debug") {
      parsed.debug = true;
    } else {
      positional.push(value);
    }
  }
  [parsed.command, parsed.target] = positional;
  return parsed;
}

function printUsage(output: SmokeOutput): void {
  output.diagnostic("Usage:");
  output.diagnostic("  smokecheck run <plan.json> [--db <path>] [--debug] [--log-level <level>]");
  output.diagnostic("  smokecheck history [--db <path>] [--limit <n>]");
}

if (require.main === module) {
  void main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      const message = error instanceof Error ? error.message : "unknown error";
      console.error(message);
      process.exit(1);
    }
  );
}
