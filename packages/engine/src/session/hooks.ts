import type { LastResponse } from "../../../shared/src/contracts";
import { HookNotFoundError } from "../errors";
import type { SmokeSession } from "./session";

export type AfterResponseHook = (
  response: LastResponse,
  session: SmokeSession
) => void | Promise<void>;

export class HookRegistry {
  private readonly hooks = new Map<string, AfterResponseHook>();

  register(name: string, hook: AfterResponseHook): this {
    this.hooks.set(name, hook);
    return this;
  }

  resolve(name: string): AfterResponseHook {
    const hook = this.hooks.get(name);
    if (!hook) {
      throw new HookNotFoundError(name);
    }
    return hook;
  }

  names(): string[] {
    return [...this.hooks.keys()];
  }
}

/**
 * Builds a hook that installs the first capture group of `pattern` as the
 * session's CSRF token. A response without a match keeps the current token.
 */
export function csrfTokenExtractor(
  pattern: RegExp | string,
  source: "body" | "headers" = "body"
): AfterResponseHook {
  // Without g or y, every exec starts at index 0.
  const expression =
    typeof pattern === "string"
      ? new RegExp(pattern)
      : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  return (response, session) => {
    const text = source === "body" ? response.body : response.headers.join("\n");
    const match = expression.exec(text);
    const token = match?.[1];
    if (token !== undefined) {
      session.config.setCsrfToken(token);
    }
  };
}
