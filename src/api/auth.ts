/**
 * API key authentication for the `x-api-key` header
 */

import type { IncomingHttpHeaders } from 'node:http';
import { AuthenticationError } from '../core/errors.js';

export const API_KEY_HEADER = 'x-api-key';

/**
 * Return the caller's key when it matches, otherwise throw.
 *
 * @throws AuthenticationError 401 when the header is missing, 403 when wrong
 */
export function validateApiKey(headers: IncomingHttpHeaders, expected: string): string {
  const raw = headers[API_KEY_HEADER];
  const provided = Array.isArray(raw) ? raw[0] : raw;

  if (!provided) {
    throw new AuthenticationError(`Missing ${API_KEY_HEADER} header`, 401);
  }
  if (provided !== expected) {
    throw new AuthenticationError('Invalid API key', 403);
  }
  return provided;
}
