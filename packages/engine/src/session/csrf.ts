export const CSRF_PLACEHOLDER = "__SMOKE_CSRF_TOKEN__";

/**
 * Substitutes every placeholder occurrence with the token, verbatim. An empty
 * token leaves the template untouched.
 */
export function renderCsrfTemplate(template: string, token: string): string {
  if (!token) {
    return template;
  }
  // split/join keeps `$&`-style sequences in the token literal.
  return template.split(CSRF_PLACEHOLDER).join(token);
}
