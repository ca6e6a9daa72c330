import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { BackendKind } from '../../core/entities/SourceHit.js';
import { SearchError, errorMessage } from '../../core/errors/ResearchErrors.js';

/**
 * The slice of node-fetch used by adapters and the extractor.
 * Injectable so tests can answer with in-process responses.
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export function isTimeoutError(error: unknown): boolean {
  return error instanceof FetchError && (error.type === 'request-timeout' || error.type === 'body-timeout');
}

export function isSizeLimitError(error: unknown): boolean {
  return error instanceof FetchError && error.type === 'max-size';
}

/**
 * Run a search request, mapping transport failures and non-2xx statuses to SearchError
 */
export async function fetchForSearch(
  fetchImpl: FetchLike,
  backend: BackendKind,
  url: string,
  init: RequestInit
): Promise<Response> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    const detail = isTimeoutError(error) ? `request timed out after ${init.timeout ?? 0}ms` : errorMessage(error);
    throw new SearchError(backend, 'Unreachable', detail, { cause: error });
  }

  if (response.status === 429) {
    throw new SearchError(backend, 'RateLimited', 'HTTP 429 Too Many Requests', { status: 429 });
  }
  if (!response.ok) {
    throw new SearchError(backend, 'Unreachable', `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  return response;
}

/**
 * Read a response body as text; a failure mid-body counts as unreachable
 */
export async function readSearchBody(backend: BackendKind, response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new SearchError(backend, 'Unreachable', `failed to read response body: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
