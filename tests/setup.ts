/**
 * Mocha root hooks keeping the suite hermetic: `fetch` rejects every
 * destination other than the loopback interface for the duration of the run
 * and is restored afterwards.
 */
import { isLoopbackUrl, requestUrl } from "./lib/networkGuard.js";

export const NETWORK_BLOCKED_MESSAGE = "network access via fetch is disabled during tests";

const originalFetch = globalThis.fetch;

async function guardedFetch(input: string | URL | Request, init?: RequestInit): Promise<Response> {
  if (!isLoopbackUrl(requestUrl(input))) {
    throw new Error(NETWORK_BLOCKED_MESSAGE);
  }
  return originalFetch(input, init);
}

export const mochaHooks = {
  beforeAll(): void {
    globalThis.fetch = guardedFetch;
  },
  afterAll(): void {
    globalThis.fetch = originalFetch;
  },
};
