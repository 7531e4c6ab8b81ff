export interface ProxyTarget {
  protocol: string;
  host: string;
  port: number;
  auth?: { username: string; password: string };
}

const DEFAULT_PROXY_PORT = 1080;
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
// URL drops a port equal to the scheme default, so read it from the text.
const EXPLICIT_PORT_PATTERN = /^(?:[a-z][a-z0-9+.-]*:\/\/)?(?:[^@/]*@)?(?:\[[^\]]*\]|[^:/?#]*):(\d+)(?=$|[/?#])/i;

/** Reads `[scheme://][user:pass@]host[:port]`; a bare host is an http proxy. */
export function parseProxy(proxy: string): ProxyTarget | undefined {
  const trimmed = proxy.trim();
  if (!trimmed) {
    return undefined;
  }
  let url: URL;
  try {
    url = new URL(SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`);
  } catch {
    return undefined;
  }
  if (!url.hostname) {
    return undefined;
  }
  const protocol = url.protocol.replace(/:$/, "");
  const explicitPort = EXPLICIT_PORT_PATTERN.exec(trimmed)?.[1];
  const target: ProxyTarget = {
    protocol,
    host: url.hostname,
    port: explicitPort ? Number(explicitPort) : DEFAULT_PROXY_PORT
  };
  if (url.username) {
    target.auth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password)
    };
  }
  return target;
}

/**
 * Matches the target host against a comma separated no-proxy list. Entries
 * match exactly or as a domain suffix; `*` matches everything.
 */
export function bypassesProxy(targetUrl: string, noProxy: string): boolean {
  const entries = noProxy
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
  if (entries.length === 0) {
    return false;
  }
  if (entries.includes("*")) {
    return true;
  }
  let hostname: string;
  try {
    hostname = new URL(targetUrl).hostname.toLowerCase();
  } catch {
    return false;
  }
  return entries.some((entry) => {
    const domain = entry.replace(/^\*?\./, "");
    return hostname === domain || hostname.endsWith(`.${domain}`);
  });
}
