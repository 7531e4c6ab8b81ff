export type ID = string;
export type ISODateTime = string;

export type HttpMethod = "GET" | "POST" | "OPTIONS";

/** Marker stored in `LastResponse.code` when no HTTP response was obtained. */
export const NO_RESPONSE = "no-response" as const;
export type NoResponse = typeof NO_RESPONSE;

export type ResponseCode = number | NoResponse;

export interface Credentials {
  username: string;
  password?: string;
}

export interface SmokeConfig {
  url_prefix: string;
  host_override: string;
  extra_headers: string[];
  origin: string;
  proxy: string;
  no_proxy: string;
  credentials?: Credentials;
  csrf_token: string;
  follow_redirects: boolean;
  debug: boolean;
  timeout_ms: number;
}

export interface LastResponse {
  method: HttpMethod;
  url: string;
  code: ResponseCode;
  body: string;
  headers: string[];
}

export interface ReportState {
  ok_count: number;
  fail_count: number;
}

export interface CheckResult {
  seq: number;
  description: string;
  passed: boolean;
  request?: { method: string; url: string; code: ResponseCode };
}

export interface ReportSummary extends ReportState {
  total: number;
  exit_code: number;
  line: string;
}

export type SessionStatus = "running" | "passed" | "failed";

export interface SessionRecord {
  id: ID;
  name: string;
  status: SessionStatus;
  started_at: ISODateTime;
  finished_at?: ISODateTime;
  ok_count: number;
  fail_count: number;
  exit_code?: number;
}

export interface CheckRecord {
  id: ID;
  session_id: ID;
  seq: number;
  description: string;
  passed: boolean;
  request_method?: string;
  request_url?: string;
  response_code?: string;
  created_at: ISODateTime;
}

export type SessionEvent =
  | { type: "REQUEST_COMPLETED"; session_id: ID; response: LastResponse }
  | { type: "CHECK_RECORDED"; session_id: ID; check: CheckResult }
  | { type: "SESSION_REPORTED"; session_id: ID; summary: ReportSummary };
