/**
 * Response rendering shared by the MCP and CLI adapters.
 *
 * Both surfaces show the same single string per call: the operation's
 * message on success, and on failure either the bare message (for
 * not-found and already-exists outcomes) or the operation's error label
 * followed by the message.
 */

import { isPlainObject } from '../../store/json.js';
import type { OperationDef } from '../registry.js';
import type { DispatchResponse } from '../types.js';

/** Error codes whose message is shown without the operation's label. */
const BARE_MESSAGE_CODES: ReadonlySet<string> = new Set(['E_NOT_FOUND', 'E_ALREADY_EXISTS']);

const DEFAULT_ERROR_LABEL = 'Error';

/**
 * The text a caller sees for a dispatch response.
 */
export function renderResponse(response: DispatchResponse, def?: OperationDef): string {
  if (response.success) {
    const data = response.data;
    if (isPlainObject(data) && typeof data['message'] === 'string') {
      return data['message'];
    }
    return JSON.stringify(data ?? null, null, 2);
  }

  const error = response.error;
  const message = error?.message ?? 'Unknown error';
  if (error && BARE_MESSAGE_CODES.has(error.code)) {
    return message;
  }
  return `${def?.errorLabel ?? DEFAULT_ERROR_LABEL}: ${message}`;
}

/**
 * Structured result behind a successful response, for JSON output.
 */
export function responseResult(response: DispatchResponse): unknown {
  const data = response.data;
  if (isPlainObject(data) && 'result' in data) {
    return data['result'];
  }
  return data;
}
