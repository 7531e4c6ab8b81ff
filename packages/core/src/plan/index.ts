export type {
  ConfigStep,
  CsrfExtraction,
  JSONSchema,
  PlanAssertions,
  PlanConfig,
  PlanCredentials,
  PlanStep,
  PreflightMethod,
  RequestStep,
  SmokePlan,
  TcpStep
} from "./types";
export { parsePlan, validatePlan } from "./validation";
export type { PlanValidation } from "./validation";
