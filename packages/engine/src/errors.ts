export class SmokeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
  }
}

export class NotFoundError extends SmokeError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class ValidationError extends SmokeError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}

export class HookNotFoundError extends NotFoundError {
  readonly hookName: string;

  constructor(hookName: string) {
    super(`After-response hook not registered: ${hookName}`);
    this.hookName = hookName;
  }
}

export class SessionClosedError extends SmokeError {
  constructor() {
    super("SESSION_CLOSED", "Session already reported; start a new session");
  }
}

export class PlanValidationError extends SmokeError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super("PLAN_INVALID", `Invalid smoke plan: ${errors.join("; ")}`);
    this.errors = errors;
  }
}
