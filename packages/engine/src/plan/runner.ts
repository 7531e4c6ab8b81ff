import fs from "fs";
import path from "path";
import {
  parsePlan,
  type PlanAssertions,
  type PlanConfig,
  type RequestStep,
  type SmokePlan
} from "../../../core/src/plan";
import { PlanValidationError } from "../errors";
import type { ConfigStore } from "../session/config-store";
import { csrfTokenExtractor } from "../session/hooks";
import type { SmokeSession } from "../session/session";

export interface RunPlanOptions {
  /** Directory that relative form-data paths resolve against. */
  baseDir: string;
}

export function loadPlanFile(filePath: string): SmokePlan {
  const parsed = parsePlan(fs.readFileSync(filePath, "utf8"));
  if (!parsed.ok) {
    throw new PlanValidationError(parsed.errors);
  }
  return parsed.plan;
}

/** Runs every step of a validated plan, then reports and returns the exit code. */
export async function runPlan(
  session: SmokeSession,
  plan: SmokePlan,
  options: RunPlanOptions
): Promise<number> {
  if (plan.config) {
    applyPlanConfig(session.config, plan.config);
  }
  if (plan.csrf) {
    session.setAfterResponse(csrfTokenExtractor(plan.csrf.pattern, plan.csrf.source ?? "body"));
  }

  for (const step of plan.steps) {
    switch (step.type) {
      case "request":
        await runRequestStep(session, step, options.baseDir);
        break;
      case "tcp":
        await session.tcpOk(step.host, step.port);
        break;
      case "config":
        applyPlanConfig(session.config, step.set);
        break;
    }
  }

  return session.report();
}

export function applyPlanConfig(store: ConfigStore, config: PlanConfig): void {
  if (config.url_prefix !== undefined) {
    store.setUrlPrefix(config.url_prefix);
  }
  if (config.host !== undefined) {
    store.setHost(config.host);
  }
  for (const header of config.headers ?? []) {
    store.setHeader(header);
  }
  if (config.origin !== undefined) {
    store.setOrigin(config.origin);
  }
  if (config.proxy !== undefined) {
    store.setProxy(config.proxy, config.no_proxy ?? "");
  }
  if (config.credentials) {
    store.setCredentials(config.credentials.username, config.credentials.password);
  }
  if (config.csrf_token !== undefined) {
    store.setCsrfToken(config.csrf_token);
  }
  if (config.follow_redirects !== undefined) {
    store.followRedirects(config.follow_redirects);
  }
  if (config.debug !== undefined) {
    store.setDebug(config.debug);
  }
  if (config.timeout_ms !== undefined) {
    store.setTimeout(config.timeout_ms);
  }
}

async function runRequestStep(
  session: SmokeSession,
  step: RequestStep,
  baseDir: string
): Promise<void> {
  if (step.preflight) {
    await session.preflight(step.url, step.preflight);
  } else if (step.cors) {
    await session.cors(step.url);
  } else {
    const method = step.method ?? (step.form ? "POST" : "GET");
    const formDataPath = step.form ? path.resolve(baseDir, step.form) : undefined;
    await session.request(method, step.url, { formDataPath });
  }
  if (step.ok) {
    session.assertCodeOk();
  }
  if (step.assert) {
    applyAssertions(session, step.assert);
  }
}

function applyAssertions(session: SmokeSession, assertions: PlanAssertions): void {
  if (assertions.no_response) {
    session.assertNoResponse();
  }
  if (assertions.code !== undefined) {
    session.assertCode(assertions.code);
  }
  if (assertions.code_ok) {
    session.assertCodeOk();
  }
  for (const pattern of assertions.body ?? []) {
    session.assertBody(pattern);
  }
  for (const pattern of assertions.body_not ?? []) {
    session.assertBodyNot(pattern);
  }
  for (const pattern of assertions.headers ?? []) {
    session.assertHeader(pattern);
  }
}
