/**
 * Response metadata.
 */

import { randomUUID } from 'node:crypto';
import type { DispatchResponse, Gateway, Source } from '../types.js';

export type DispatchMeta = DispatchResponse['_meta'];

/** Who asked for what; timing is filled in from `startTime`. */
export interface MetaTarget {
  gateway: Gateway;
  domain: string;
  operation: string;
  source?: Source;
  /** A fresh UUID when omitted. */
  requestId?: string;
}

export function createDispatchMeta(target: MetaTarget, startTime: number): DispatchMeta {
  return {
    gateway: target.gateway,
    domain: target.domain,
    operation: target.operation,
    timestamp: new Date().toISOString(),
    duration_ms: Date.now() - startTime,
    source: target.source ?? 'mcp',
    requestId: target.requestId ?? randomUUID(),
  };
}
