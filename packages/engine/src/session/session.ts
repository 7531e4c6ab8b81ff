import type {
  CheckResult,
  HttpMethod,
  LastResponse,
  ReportSummary,
  SessionEvent,
  SmokeConfig
} from "../../../shared/src/contracts";
import type { PreflightMethod } from "../../../core/src/plan";
import { SessionClosedError, ValidationError } from "../errors";
import { Logger } from "../logger";
import { newId } from "../utils/ids";
import { AssertionEngine } from "./assertions";
import { ConfigStore } from "./config-store";
import { SessionEventHub } from "./event-hub";
import { HookRegistry, type AfterResponseHook } from "./hooks";
import { consoleOutput, type SmokeOutput } from "./output";
import { promptPassword, type PasswordPrompt } from "./password";
import { printReport, summarize } from "./reporter";
import { RequestExecutor, type ExecuteOptions } from "./request-executor";
import { probeTcp } from "./tcp";
import { AxiosTransport, type HttpTransport } from "./transport";

export interface SmokeSessionOptions {
  name?: string;
  config?: Partial<SmokeConfig>;
  transport?: HttpTransport;
  output?: SmokeOutput;
  logger?: Logger;
  hooks?: HookRegistry;
  /** A hook, or the name of one registered in `hooks`. */
  afterResponse?: AfterResponseHook | string;
  promptPassword?: PasswordPrompt;
}

/**
 * One linear smoke run: configure, request, assert, repeat, then report.
 * Calls are meant to be awaited one after another; the session holds a
 * single last response that every assertion reads.
 */
export class SmokeSession {
  readonly id: string;
  readonly name: string;
  readonly config: ConfigStore;
  readonly hooks: HookRegistry;
  private readonly output: SmokeOutput;
  private readonly logger: Logger;
  private readonly events = new SessionEventHub();
  private readonly executor: RequestExecutor;
  private readonly assertions: AssertionEngine;
  private afterResponse?: AfterResponseHook | string;
  private last?: LastResponse;
  private closed = false;

  constructor(options: SmokeSessionOptions = {}) {
    this.id = newId();
    this.name = options.name ?? "smoke";
    this.config = new ConfigStore(options.config);
    this.hooks = options.hooks ?? new HookRegistry();
    this.output = options.output ?? consoleOutput;
    this.logger = options.logger ?? new Logger("warn");
    this.afterResponse = options.afterResponse;
    this.executor = new RequestExecutor({
      transport: options.transport ?? new AxiosTransport(),
      config: this.config,
      output: this.output,
      logger: this.logger,
      promptPassword: options.promptPassword ?? promptPassword
    });
    this.assertions = new AssertionEngine(this.output, (check) => this.emitCheck(check));
  }

  get lastResponse(): LastResponse | undefined {
    return this.last;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  subscribe(listener: (event: SessionEvent) => void): () => void {
    return this.events.subscribe(listener);
  }

  setAfterResponse(hook?: AfterResponseHook | string): void {
    this.afterResponse = hook;
  }

  async request(method: HttpMethod, url: string, options: ExecuteOptions = {}): Promise<LastResponse> {
    this.ensureOpen();
    const response = await this.executor.execute(method, url, options);
    this.last = response;
    this.events.emit({ type: "REQUEST_COMPLETED", session_id: this.id, response });
    await this.runAfterResponse(response);
    return response;
  }

  get(url: string): Promise<LastResponse> {
    return this.request("GET", url);
  }

  post(url: string, formDataPath?: string): Promise<LastResponse> {
    return this.request("POST", url, { formDataPath });
  }

  options(url: string): Promise<LastResponse> {
    return this.request("OPTIONS", url);
  }

  async getOk(url: string): Promise<LastResponse> {
    const response = await this.get(url);
    this.assertCodeOk();
    return response;
  }

  async postOk(url: string, formDataPath?: string): Promise<LastResponse> {
    const response = await this.post(url, formDataPath);
    this.assertCodeOk();
    return response;
  }

  /** A GET carrying the configured Origin; the origin must be set first. */
  async cors(url: string): Promise<LastResponse> {
    this.requireOrigin("cors");
    return this.request("GET", url);
  }

  /** An OPTIONS preflight announcing `method` from the configured Origin. */
  async preflight(url: string, method: PreflightMethod): Promise<LastResponse> {
    this.requireOrigin("preflight");
    return this.request("OPTIONS", url, {
      headers: { "Access-Control-Request-Method": method }
    });
  }

  async tcpOk(host: string, port: number): Promise<CheckResult> {
    this.ensureOpen();
    const connected = await probeTcp(host, port, this.config.snapshot().timeout_ms);
    return this.assertions.record(`TCP connect to ${host}:${port}`, connected);
  }

  assertBody(pattern: string): CheckResult {
    this.ensureOpen();
    return this.assertions.body(this.last, pattern);
  }

  assertBodyNot(pattern: string): CheckResult {
    this.ensureOpen();
    return this.assertions.bodyNot(this.last, pattern);
  }

  assertHeader(pattern: string): CheckResult {
    this.ensureOpen();
    return this.assertions.header(this.last, pattern);
  }

  assertCode(code: number): CheckResult {
    this.ensureOpen();
    return this.assertions.code(this.last, code);
  }

  assertCodeOk(): CheckResult {
    this.ensureOpen();
    return this.assertions.codeOk(this.last);
  }

  assertNoResponse(): CheckResult {
    this.ensureOpen();
    return this.assertions.noResponse(this.last);
  }

  summary(): ReportSummary {
    return summarize(this.assertions.state());
  }

  /** Prints the summary, closes the session and returns the exit code. */
  report(): number {
    this.ensureOpen();
    const summary = this.summary();
    printReport(this.output, summary);
    this.closed = true;
    this.events.emit({ type: "SESSION_REPORTED", session_id: this.id, summary });
    return summary.exit_code;
  }

  reportAndExit(): never {
    process.exit(this.report());
  }

  private async runAfterResponse(response: LastResponse): Promise<void> {
    if (!this.afterResponse) {
      return;
    }
    const hook =
      typeof this.afterResponse === "string"
        ? this.hooks.resolve(this.afterResponse)
        : this.afterResponse;
    this.logger.debug("Running after-response hook", {
      hook: typeof this.afterResponse === "string" ? this.afterResponse : hook.name || "anonymous",
      code: response.code
    });
    await hook(response, this);
  }

  private emitCheck(check: CheckResult): void {
    this.events.emit({ type: "CHECK_RECORDED", session_id: this.id, check });
  }

  private requireOrigin(operation: string): void {
    if (!this.config.snapshot().origin) {
      throw new ValidationError(`${operation} requires an origin; call config.setOrigin() first`);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new SessionClosedError();
    }
  }
}
