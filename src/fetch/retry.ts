import { HttpError } from "../utils/errors";
import { sleep } from "../utils/time";

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export type FetchImpl = (url: string, init?: RequestInit) => Promise<Response>;

export interface BackoffOptions {
  maxTries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
  wait?: (ms: number) => Promise<void>;
}

async function fetchWithTimeout(
  fetchImpl: FetchImpl,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * GET/POST with exponential backoff on 429 and 5xx gateway statuses.
 * Other non-OK statuses throw HttpError straight away; running out of
 * attempts throws an Error naming the last status.
 */
export async function requestWithBackoff(
  url: string,
  init: RequestInit = {},
  options: BackoffOptions = {}
): Promise<Response> {
  const maxTries = Math.max(1, options.maxTries ?? 5);
  const maxDelayMs = options.maxDelayMs ?? 16000;
  const timeoutMs = options.timeoutMs ?? 60000;
  const fetchImpl = options.fetchImpl ?? fetch;
  const wait = options.wait ?? sleep;

  let delayMs = options.initialDelayMs ?? 1000;
  let lastStatus: number | null = null;

  for (let attempt = 1; attempt <= maxTries; attempt += 1) {
    const res = await fetchWithTimeout(fetchImpl, url, init, timeoutMs);
    if (res.ok) return res;

    if (!RETRYABLE_STATUSES.has(res.status)) {
      throw new HttpError(res.status, url, res.statusText);
    }
    lastStatus = res.status;
    if (attempt < maxTries) {
      await wait(delayMs);
      delayMs = Math.min(delayMs * 2, maxDelayMs);
    }
  }

  throw new Error(`Request to ${url} failed after ${maxTries} tries (last=${lastStatus})`);
}
