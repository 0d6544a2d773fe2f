/**
 * Allow/deny logic of the offline guard installed by `tests/setup.ts`. Kept
 * apart so the decisions can be tested without the Mocha bootstrap.
 */
const LOOPBACK_HOSTS = new Set(["127.0.0.1", "::1", "localhost"]);

/** Normalises IPv4/IPv6 textual representations for comparison. */
export function normaliseHost(host: string | undefined): string | undefined {
  if (!host) {
    return undefined;
  }
  const trimmed = host.trim().toLowerCase();
  if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/** Extracts a URL instance from the WHATWG fetch signature. */
export function requestUrl(input: string | URL | Request): URL {
  if (input instanceof URL) {
    return input;
  }
  return new URL(typeof input === "string" ? input : input.url);
}

export function isLoopbackUrl(url: URL): boolean {
  const host = normaliseHost(url.hostname);
  return host !== undefined && LOOPBACK_HOSTS.has(host);
}
