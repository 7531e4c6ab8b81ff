import type { Credentials, SmokeConfig } from "../../../shared/src/contracts";
import { DEFAULT_TIMEOUT_MS } from "../config";

export function defaultSmokeConfig(): SmokeConfig {
  return {
    url_prefix: "",
    host_override: "",
    extra_headers: [],
    origin: "",
    proxy: "",
    no_proxy: "",
    credentials: undefined,
    csrf_token: "",
    follow_redirects: true,
    debug: false,
    timeout_ms: DEFAULT_TIMEOUT_MS
  };
}

export function headerKey(line: string): string {
  const colon = line.indexOf(":");
  const key = colon === -1 ? line : line.slice(0, colon);
  return key.trim().toLowerCase();
}

export class ConfigStore {
  private state: SmokeConfig;

  constructor(initial?: Partial<SmokeConfig>) {
    this.state = { ...defaultSmokeConfig(), ...initial };
    this.state.extra_headers = [...this.state.extra_headers];
    this.state.credentials = copyCredentials(this.state.credentials);
  }

  snapshot(): SmokeConfig {
    return {
      ...this.state,
      extra_headers: [...this.state.extra_headers],
      credentials: copyCredentials(this.state.credentials)
    };
  }

  setUrlPrefix(prefix: string): void {
    this.state.url_prefix = prefix;
  }

  setHost(host: string): void {
    this.state.host_override = host;
  }

  clearHost(): void {
    this.state.host_override = "";
  }

  /** Accepts either a full "Key: Value" line or a key and a value. */
  setHeader(lineOrKey: string, value?: string): void {
    const line = value === undefined ? lineOrKey : `${lineOrKey}: ${value}`;
    const key = headerKey(line);
    this.state.extra_headers = this.state.extra_headers.filter((entry) => headerKey(entry) !== key);
    this.state.extra_headers.push(line);
  }

  unsetHeader(key: string): void {
    const normalized = headerKey(key);
    this.state.extra_headers = this.state.extra_headers.filter(
      (entry) => headerKey(entry) !== normalized
    );
  }

  clearHeaders(): void {
    this.state.extra_headers = [];
  }

  setOrigin(origin: string): void {
    this.state.origin = origin;
  }

  clearOrigin(): void {
    this.state.origin = "";
  }

  setProxy(proxy: string, noProxy = ""): void {
    this.state.proxy = proxy;
    this.state.no_proxy = noProxy;
  }

  clearProxy(): void {
    this.state.proxy = "";
    this.state.no_proxy = "";
  }

  /** Leaving the password out makes the next request ask for it. */
  setCredentials(username: string, password?: string): void {
    this.state.credentials = password === undefined ? { username } : { username, password };
  }

  setPassword(password: string): void {
    if (this.state.credentials) {
      this.state.credentials = { ...this.state.credentials, password };
    }
  }

  clearCredentials(): void {
    this.state.credentials = undefined;
  }

  setCsrfToken(token: string): void {
    this.state.csrf_token = token;
  }

  clearCsrfToken(): void {
    this.state.csrf_token = "";
  }

  followRedirects(enabled = true): void {
    this.state.follow_redirects = enabled;
  }

  setDebug(enabled = true): void {
    this.state.debug = enabled;
  }

  setTimeout(timeoutMs: number): void {
    this.state.timeout_ms = timeoutMs;
  }
}

function copyCredentials(credentials?: Credentials): Credentials | undefined {
  return credentials ? { ...credentials } : undefined;
}
