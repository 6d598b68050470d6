/**
 * backendError.ts
 * Extract a readable message from a failed model backend response
 */

import { safeJsonParse } from './json-utils.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Backends answer errors as `{error}`, `{detail}`, `{message}` or plain text.
 */
export async function parseBackendError(response: Response): Promise<string> {
  const statusText = `HTTP ${response.status}: ${response.statusText}`;

  let text: string;
  try {
    text = await response.text();
  } catch {
    return statusText;
  }

  const json = safeJsonParse(text);
  if (isRecord(json)) {
    for (const field of ['error', 'detail', 'message']) {
      const value = json[field];
      if (typeof value === 'string' && value.length > 0) {
        return `HTTP ${response.status}: ${value}`;
      }
    }
  }

  if (text.length > 0 && text.length < 500) {
    return `HTTP ${response.status}: ${text}`;
  }
  return statusText;
}
