/**
 * Hazard Relay: HTTP helpers
 */

import { FetchFailure } from './errors';
import { errorMessage } from './logger';

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * GET a document as text. Any transport error or non-2xx status becomes a FetchFailure.
 */
export async function fetchText(
  url: string,
  options: { userAgent: string; timeoutMs: number; accept?: string }
): Promise<string> {
  let res: Response;
  try {
    res = await fetchWithTimeout(
      url,
      {
        method: 'GET',
        headers: {
          Accept: options.accept ?? '*/*',
          'User-Agent': options.userAgent,
        },
      },
      options.timeoutMs
    );
  } catch (error) {
    const reason = isAbortError(error)
      ? `timed out after ${options.timeoutMs}ms`
      : errorMessage(error);
    throw new FetchFailure(`GET ${url} failed: ${reason}`, url, undefined, { cause: error });
  }

  if (!res.ok) {
    throw new FetchFailure(`GET ${url} returned HTTP ${res.status}`, url, res.status);
  }

  try {
    return await res.text();
  } catch (error) {
    throw new FetchFailure(`GET ${url} body unreadable: ${errorMessage(error)}`, url, res.status, {
      cause: error,
    });
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
