import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { HttpMethod } from "../../../shared/src/contracts";
import type { ProxyTarget } from "./proxy";

export const MAX_REDIRECTS = 10;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  auth?: { username: string; password: string };
  proxy: ProxyTarget | false;
  followRedirects: boolean;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  body: string;
  headers: string[];
}

/** Rejects when no HTTP response could be obtained. */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;

  constructor(client: AxiosInstance = axios.create()) {
    this.client = client;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.client.request<string>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: request.body,
      auth: request.auth,
      proxy: request.proxy,
      maxRedirects: request.followRedirects ? MAX_REDIRECTS : 0,
      timeout: request.timeoutMs,
      signal: AbortSignal.timeout(request.timeoutMs),
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true
    });
    return {
      status: response.status,
      body: typeof response.data === "string" ? response.data : "",
      headers: rawHeaderLines(response.request) ?? headerLines(response.headers)
    };
  }
}

// The Node adapter exposes the final ClientRequest; its IncomingMessage keeps
// header names as sent and in receipt order.
function rawHeaderLines(request: unknown): string[] | undefined {
  if (typeof request !== "object" || request === null || !("res" in request)) {
    return undefined;
  }
  const incoming = request.res;
  if (typeof incoming !== "object" || incoming === null || !("rawHeaders" in incoming)) {
    return undefined;
  }
  const raw = incoming.rawHeaders;
  if (!Array.isArray(raw)) {
    return undefined;
  }
  const lines: string[] = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    lines.push(`${String(raw[i])}: ${String(raw[i + 1])}`);
  }
  return lines;
}

function headerLines(headers: AxiosResponse["headers"]): string[] {
  const lines: string[] = [];
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) {
      continue;
    }
    const values: unknown[] = Array.isArray(value) ? value : [value];
    for (const entry of values) {
      lines.push(`${name}: ${String(entry)}`);
    }
  }
  return lines;
}
