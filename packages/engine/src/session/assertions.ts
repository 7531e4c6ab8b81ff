import {
  NO_RESPONSE,
  type CheckResult,
  type LastResponse,
  type ReportState,
  type ResponseCode
} from "../../../shared/src/contracts";
import type { SmokeOutput } from "./output";

export const OK_MARK = "[ OK ]";
export const FAIL_MARK = "[FAIL]";

/**
 * Compiles a body or header pattern. Patterns are regular expressions
 * searched anywhere in the text; one that does not compile is treated as a
 * literal substring.
 */
export function compilePattern(pattern: string): (text: string) => boolean {
  try {
    const expression = new RegExp(pattern);
    return (text) => expression.test(text);
  } catch {
    return (text) => text.includes(pattern);
  }
}

export function formatCode(code: ResponseCode): string {
  return code === NO_RESPONSE ? "no response" : String(code);
}

export class AssertionEngine {
  private readonly output: SmokeOutput;
  private readonly onCheck: (check: CheckResult) => void;
  private okCount = 0;
  private failCount = 0;

  constructor(output: SmokeOutput, onCheck: (check: CheckResult) => void = () => undefined) {
    this.output = output;
    this.onCheck = onCheck;
  }

  state(): ReportState {
    return { ok_count: this.okCount, fail_count: this.failCount };
  }

  record(description: string, passed: boolean, response?: LastResponse): CheckResult {
    if (passed) {
      this.okCount += 1;
    } else {
      this.failCount += 1;
    }
    const check: CheckResult = {
      seq: this.okCount + this.failCount,
      description,
      passed,
      request: response
        ? { method: response.method, url: response.url, code: response.code }
        : undefined
    };
    this.output.line(`    ${passed ? OK_MARK : FAIL_MARK} ${description}`);
    this.onCheck(check);
    return check;
  }

  body(response: LastResponse | undefined, pattern: string): CheckResult {
    return this.matchText(response, `Body contains "${pattern}"`, pattern, bodyOf, true);
  }

  bodyNot(response: LastResponse | undefined, pattern: string): CheckResult {
    return this.matchText(response, `Body does not contain "${pattern}"`, pattern, bodyOf, false);
  }

  header(response: LastResponse | undefined, pattern: string): CheckResult {
    return this.matchText(response, `Headers contain "${pattern}"`, pattern, headersOf, true);
  }

  code(response: LastResponse | undefined, expected: number): CheckResult {
    const description = `Response code is ${expected}`;
    if (!response) {
      return this.record(`${description} (no request made)`, false);
    }
    const passed = response.code === expected;
    return this.record(
      passed ? description : `${description} (got ${formatCode(response.code)})`,
      passed,
      response
    );
  }

  codeOk(response: LastResponse | undefined): CheckResult {
    const description = "Response code is 2xx";
    if (!response) {
      return this.record(`${description} (no request made)`, false);
    }
    const passed = isSuccessCode(response.code);
    return this.record(
      passed ? `${description} (${response.code})` : `${description} (got ${formatCode(response.code)})`,
      passed,
      response
    );
  }

  noResponse(response: LastResponse | undefined): CheckResult {
    const description = "No response";
    if (!response) {
      return this.record(`${description} (no request made)`, false);
    }
    const passed = response.code === NO_RESPONSE;
    return this.record(
      passed ? description : `${description} (got ${formatCode(response.code)})`,
      passed,
      response
    );
  }

  private matchText(
    response: LastResponse | undefined,
    description: string,
    pattern: string,
    select: (response: LastResponse) => string,
    expectMatch: boolean
  ): CheckResult {
    if (!response) {
      return this.record(`${description} (no request made)`, false);
    }
    if (response.code === NO_RESPONSE) {
      return this.record(`${description} (no response)`, false, response);
    }
    const matched = compilePattern(pattern)(select(response));
    return this.record(description, matched === expectMatch, response);
  }
}

export function isSuccessCode(code: ResponseCode): boolean {
  return code !== NO_RESPONSE && code >= 200 && code < 300;
}

function bodyOf(response: LastResponse): string {
  return response.body;
}

function headersOf(response: LastResponse): string {
  return response.headers.join("\n");
}
