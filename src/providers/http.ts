/**
 * JSON-over-HTTP transport for provider requests
 */

import { MalformedResponseError, TransportError } from '../errors.js';
import type { ProviderRequest, Transport } from './types.js';

/** Characters of an error body kept in the message */
const ERROR_BODY_EXCERPT = 500;

/**
 * POST a request with a hard timeout. No retries.
 *
 * Network failure, timeout or a non-2xx status raise TransportError;
 * a body that is not JSON raises MalformedResponseError.
 */
export const postJson: Transport = async (request, timeoutMs) => {
  let response: Response;
  try {
    response = await fetch(request.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...request.headers,
      },
      body: JSON.stringify(request.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new TransportError(
        `Request to ${redactUrl(request.url)} timed out after ${timeoutMs}ms`,
        null,
        { cause: error }
      );
    }
    const msg = error instanceof Error ? error.message : String(error);
    throw new TransportError(
      `Request to ${redactUrl(request.url)} failed: ${msg}`,
      null,
      { cause: error }
    );
  }

  const text = await response.text();

  if (!response.ok) {
    throw new TransportError(
      `HTTP ${response.status} from ${redactUrl(request.url)}: ${text.slice(0, ERROR_BODY_EXCERPT)}`,
      response.status
    );
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(
      `Response from ${redactUrl(request.url)} is not JSON`,
      { cause: error }
    );
  }
};

/**
 * Drop the query string, which may carry an API key
 */
export function redactUrl(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}
