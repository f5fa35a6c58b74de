/**
 * Invocation Errors — classify model-call failures as transient or permanent
 *
 * Transient: timeouts, rate limits, dropped connections, well-known
 * network error codes and HTTP 429/5xx. Everything else is permanent
 * and fails the node without a retry.
 */

import type { NodeError, NodeErrorKind } from '@docweave/shared';

const TRANSIENT_KINDS: ReadonlySet<NodeErrorKind> = new Set(['timeout', 'rate_limited', 'connection']);

export const TRANSIENT_NETWORK_CODES: readonly string[] = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
];

export class InvocationError extends Error {
  readonly kind: NodeErrorKind;
  readonly transient: boolean;

  constructor(kind: NodeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvocationError';
    this.kind = kind;
    this.transient = TRANSIENT_KINDS.has(kind);
  }
}

/**
 * Map an HTTP status to an error kind. 429 → rate_limited, 5xx →
 * connection, other 4xx → invalid_request.
 */
export function kindForStatus(status: number): NodeErrorKind {
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'connection';
  if (status >= 400) return 'invalid_request';
  return 'unknown';
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof InvocationError) return err.transient;
  if (!isObject(err)) return false;

  const code = err.code;
  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.includes(code)) return true;

  const status = typeof err.status === 'number' ? err.status : err.statusCode;
  if (typeof status === 'number') {
    return status === 429 || (status >= 500 && status < 600);
  }

  return false;
}

/**
 * Normalize anything thrown by an invoker into a NodeError.
 */
export function toNodeError(err: unknown): NodeError {
  if (err instanceof InvocationError) {
    return { kind: err.kind, message: err.message };
  }

  const message = err instanceof Error ? err.message : String(err);
  if (!isObject(err)) {
    return { kind: 'unknown', message };
  }

  if (typeof err.code === 'string' && TRANSIENT_NETWORK_CODES.includes(err.code)) {
    return { kind: err.code === 'ETIMEDOUT' ? 'timeout' : 'connection', message };
  }

  const status = typeof err.status === 'number' ? err.status : err.statusCode;
  if (typeof status === 'number') {
    return { kind: kindForStatus(status), message };
  }

  return { kind: 'unknown', message };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
