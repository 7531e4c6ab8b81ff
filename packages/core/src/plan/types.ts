import type { HttpMethod } from "../../../shared/src/contracts";

export type JSONSchema = Record<string, unknown>;

export interface PlanCredentials {
  username: string;
  password?: string;
}

export interface PlanConfig {
  url_prefix?: string;
  host?: string;
  headers?: string[];
  origin?: string;
  proxy?: string;
  no_proxy?: string;
  credentials?: PlanCredentials;
  csrf_token?: string;
  follow_redirects?: boolean;
  debug?: boolean;
  timeout_ms?: number;
}

export interface PlanAssertions {
  code?: number;
  code_ok?: boolean;
  body?: string[];
  body_not?: string[];
  headers?: string[];
  no_response?: boolean;
}

export type PreflightMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface RequestStep {
  type: "request";
  method?: HttpMethod;
  url: string;
  form?: string;
  ok?: boolean;
  cors?: boolean;
  preflight?: PreflightMethod;
  assert?: PlanAssertions;
}

export interface TcpStep {
  type: "tcp";
  host: string;
  port: number;
}

export interface ConfigStep {
  type: "config";
  set: PlanConfig;
}

export type PlanStep = RequestStep | TcpStep | ConfigStep;

export interface CsrfExtraction {
  pattern: string;
  source?: "body" | "headers";
}

export interface SmokePlan {
  name?: string;
  config?: PlanConfig;
  csrf?: CsrfExtraction;
  steps: PlanStep[];
}
