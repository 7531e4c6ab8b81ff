import Ajv from "ajv/dist/2020";
import type { ErrorObject } from "ajv";
import type { JSONSchema, SmokePlan } from "./types";
import planSchema from "./schemas/smoke_plan.schema.json";

const ajv = new Ajv({ allErrors: true, strict: true });

const validatePlanSchema = ajv.compile<SmokePlan>(planSchema as JSONSchema);

export type PlanValidation =
  | { ok: true; plan: SmokePlan; errors: [] }
  | { ok: false; errors: string[] };

export function validatePlan(content: unknown): PlanValidation {
  if (!validatePlanSchema(content)) {
    return { ok: false, errors: normalizeErrors(validatePlanSchema.errors) };
  }
  const errors = [...validatePatterns(content), ...validateOrigins(content)];
  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, plan: content, errors: [] };
}

export function parsePlan(text: string): PlanValidation {
  let content: unknown;
  try {
    content = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown error";
    return { ok: false, errors: [`plan is not valid JSON: ${message}`] };
  }
  return validatePlan(content);
}

// The CSRF extractor needs a compilable expression with a capture group.
function validatePatterns(plan: SmokePlan): string[] {
  if (!plan.csrf) {
    return [];
  }
  try {
    // An alternation with the empty string always matches, exposing the group count.
    const groups = new RegExp(`${plan.csrf.pattern}|`).exec("")?.length ?? 0;
    if (groups < 2) {
      return ["/csrf/pattern must contain a capture group"];
    }
  } catch {
    return ["/csrf/pattern is not a valid regular expression"];
  }
  return [];
}

// cors and preflight steps send the configured Origin, so one must be set first.
function validateOrigins(plan: SmokePlan): string[] {
  const errors: string[] = [];
  let origin = plan.config?.origin ?? "";
  plan.steps.forEach((step, index) => {
    if (step.type === "config") {
      origin = step.set.origin ?? origin;
    } else if (step.type === "request" && (step.cors || step.preflight) && !origin) {
      const kind = step.preflight ? "preflight" : "cors";
      errors.push(`/steps/${index} ${kind} requires an origin set by an earlier config`);
    }
  });
  return errors;
}

function normalizeErrors(errors?: ErrorObject[] | null): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map((error) => `${error.instancePath} ${error.message}`.trim());
}
