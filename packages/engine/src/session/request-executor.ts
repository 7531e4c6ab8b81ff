import fs from "fs";
import {
  NO_RESPONSE,
  type HttpMethod,
  type LastResponse,
  type SmokeConfig
} from "../../../shared/src/contracts";
import { Logger } from "../logger";
import type { ConfigStore } from "./config-store";
import { renderCsrfTemplate } from "./csrf";
import type { SmokeOutput } from "./output";
import type { PasswordPrompt } from "./password";
import { bypassesProxy, parseProxy, type ProxyTarget } from "./proxy";
import type { HttpTransport, TransportRequest } from "./transport";

export const USER_AGENT = "smokecheck/0.1";
const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";
const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

export interface ExecuteOptions {
  /** File whose contents become the POST body, CSRF placeholder rendered. */
  formDataPath?: string;
  /** Headers for this request only, applied after the configured ones. */
  headers?: Record<string, string>;
}

export function resolveUrl(prefix: string, url: string): string {
  return ABSOLUTE_URL.test(url) ? url : `${prefix}${url}`;
}

export class RequestExecutor {
  private readonly transport: HttpTransport;
  private readonly config: ConfigStore;
  private readonly output: SmokeOutput;
  private readonly logger: Logger;
  private readonly promptPassword: PasswordPrompt;

  constructor(deps: {
    transport: HttpTransport;
    config: ConfigStore;
    output: SmokeOutput;
    logger: Logger;
    promptPassword: PasswordPrompt;
  }) {
    this.transport = deps.transport;
    this.config = deps.config;
    this.output = deps.output;
    this.logger = deps.logger;
    this.promptPassword = deps.promptPassword;
  }

  async execute(method: HttpMethod, url: string, options: ExecuteOptions = {}): Promise<LastResponse> {
    await this.ensurePassword();
    const config = this.config.snapshot();
    const target = resolveUrl(config.url_prefix, url);
    this.output.line(`> ${method} ${target}`);

    let body: string | undefined;
    if (method === "POST") {
      try {
        body = await readFormBody(options.formDataPath, config.csrf_token);
      } catch (error) {
        this.logger.warn("Form data could not be read", {
          path: options.formDataPath,
          error: errorMessage(error)
        });
        return this.finish(config, noResponse(method, target));
      }
    }

    const request: TransportRequest = {
      method,
      url: target,
      headers: buildHeaders(config, body !== undefined, options.headers, this.logger),
      body,
      auth: config.credentials
        ? { username: config.credentials.username, password: config.credentials.password ?? "" }
        : undefined,
      proxy: this.resolveProxy(config, target),
      followRedirects: config.follow_redirects,
      timeoutMs: config.timeout_ms
    };
    if (config.debug) {
      echoRequest(this.output, request);
    }

    let response: LastResponse;
    try {
      const received = await this.transport.send(request);
      response = {
        method,
        url: target,
        code: received.status,
        body: received.body,
        headers: received.headers
      };
    } catch (error) {
      this.logger.debug("Request got no response", { method, url: target, error: errorMessage(error) });
      response = noResponse(method, target);
    }
    return this.finish(config, response);
  }

  // A password left out of the credentials is asked for once, then kept.
  private async ensurePassword(): Promise<void> {
    const credentials = this.config.snapshot().credentials;
    if (!credentials || credentials.password !== undefined) {
      return;
    }
    const password = await this.promptPassword(credentials.username);
    this.config.setPassword(password);
  }

  private resolveProxy(config: SmokeConfig, target: string): ProxyTarget | false {
    if (!config.proxy || bypassesProxy(target, config.no_proxy)) {
      return false;
    }
    const proxy = parseProxy(config.proxy);
    if (!proxy) {
      this.logger.warn("Ignoring unparsable proxy", { proxy: config.proxy });
      return false;
    }
    return proxy;
  }

  private finish(config: SmokeConfig, response: LastResponse): LastResponse {
    if (config.debug) {
      echoResponse(this.output, response);
    }
    return response;
  }
}

export function noResponse(method: HttpMethod, url: string): LastResponse {
  return { method, url, code: NO_RESPONSE, body: "", headers: [] };
}

async function readFormBody(formDataPath: string | undefined, csrfToken: string): Promise<string> {
  if (!formDataPath) {
    return "";
  }
  const template = await fs.promises.readFile(formDataPath, "utf8");
  return renderCsrfTemplate(template, csrfToken);
}

/**
 * Header precedence, later entries replacing earlier ones case-insensitively:
 * defaults, Host override, Origin, configured extra headers, per-request
 * headers.
 */
export function buildHeaders(
  config: SmokeConfig,
  hasBody: boolean,
  requestHeaders: Record<string, string> = {},
  logger?: Logger
): Record<string, string> {
  const headers: Record<string, string> = {};
  setHeader(headers, "User-Agent", USER_AGENT);
  if (hasBody) {
    setHeader(headers, "Content-Type", FORM_CONTENT_TYPE);
  }
  if (config.host_override) {
    setHeader(headers, "Host", config.host_override);
  }
  if (config.origin) {
    setHeader(headers, "Origin", config.origin);
  }
  for (const line of config.extra_headers) {
    const colon = line.indexOf(":");
    if (colon <= 0) {
      logger?.warn("Skipping malformed header", { header: line });
      continue;
    }
    setHeader(headers, line.slice(0, colon).trim(), line.slice(colon + 1).trim());
  }
  for (const [name, value] of Object.entries(requestHeaders)) {
    setHeader(headers, name, value);
  }
  return headers;
}

function setHeader(headers: Record<string, string>, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const existing of Object.keys(headers)) {
    if (existing.toLowerCase() === lower) {
      delete headers[existing];
    }
  }
  headers[name] = value;
}

function echoRequest(output: SmokeOutput, request: TransportRequest): void {
  output.diagnostic(`> ${request.method} ${request.url}`);
  for (const [name, value] of Object.entries(request.headers)) {
    output.diagnostic(`> ${name}: ${value}`);
  }
  if (request.proxy) {
    output.diagnostic(`* via proxy ${request.proxy.host}:${request.proxy.port}`);
  }
  if (request.body) {
    output.diagnostic(">");
    output.diagnostic(request.body);
  }
}

function echoResponse(output: SmokeOutput, response: LastResponse): void {
  if (response.code === NO_RESPONSE) {
    output.diagnostic("< (no response)");
    return;
  }
  output.diagnostic(`< ${response.code}`);
  for (const header of response.headers) {
    output.diagnostic(`< ${header}`);
  }
  output.diagnostic("<");
  output.diagnostic(response.body);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
