/**
 * Model Invokers
 *
 * createHttpInvoker — POSTs each call as JSON to a model gateway
 * createMockInvoker — deterministic, offline; used by `run --mock` and tests
 */

import { InvocationError, TRANSIENT_NETWORK_CODES, kindForStatus } from './invocation-errors.js';
import { sleep } from './invocation.js';
import type { ModelCall, ModelInvoker } from './types.js';

export interface HttpInvokerOptions {
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

/**
 * Request body: { nodeId, modelId, instruction, upstreamOutputs }
 * Response body: { output: string }
 */
export function createHttpInvoker(url: string, options: HttpInvokerOptions = {}): ModelInvoker {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (call: ModelCall): Promise<string> => {
    let res: Response;
    try {
      res = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...options.headers },
        body: JSON.stringify({
          nodeId: call.nodeId,
          modelId: call.modelId,
          instruction: call.instruction,
          upstreamOutputs: call.upstreamOutputs,
        }),
        signal: call.signal,
      });
    } catch (err) {
      throw networkError(err);
    }

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new InvocationError(
        kindForStatus(res.status),
        `Model gateway returned ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`
      );
    }

    const body: unknown = await res.json();
    if (typeof body === 'object' && body !== null && 'output' in body && typeof body.output === 'string') {
      return body.output;
    }
    throw new InvocationError('invalid_request', 'Model gateway response has no string "output" field');
  };
}

function networkError(err: unknown): InvocationError {
  const message = err instanceof Error ? err.message : String(err);
  const cause = err instanceof Error ? err.cause : undefined;
  const code = typeof cause === 'object' && cause !== null && 'code' in cause ? cause.code : undefined;

  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.includes(code)) {
    return new InvocationError(code === 'ETIMEDOUT' ? 'timeout' : 'connection', `${message} (${code})`, { cause: err });
  }
  if (err instanceof Error && err.name === 'AbortError') {
    return new InvocationError('cancelled', message, { cause: err });
  }
  return new InvocationError('connection', message, { cause: err });
}

// ─── Mock ────────────────────────────────────────────────────────

export interface MockInvokerOptions {
  latencyMs?: number;
  respond?: (call: ModelCall) => string;
}

/**
 * Echo invoker: "[<modelId>] <nodeId>: <instruction>" plus the number of
 * upstream inputs. Waits `latencyMs` (default 0), stopping early on abort.
 */
export function createMockInvoker(options: MockInvokerOptions = {}): ModelInvoker {
  const latencyMs = options.latencyMs ?? 0;
  const respond = options.respond ?? defaultResponse;

  return async (call: ModelCall): Promise<string> => {
    if (latencyMs > 0) await sleep(latencyMs, call.signal);
    if (call.signal.aborted) {
      throw new InvocationError('cancelled', `Mock call for "${call.nodeId}" aborted`);
    }
    return respond(call);
  };
}

function defaultResponse(call: ModelCall): string {
  return `[${call.modelId}] ${call.nodeId}: ${call.instruction} (${call.upstreamOutputs.length} inputs)`;
}
