/**
 * Invocation — one model call with a per-attempt timeout, retried on
 * transient failure with exponential backoff.
 *
 * An attempt settles as soon as its timeout fires or the run is
 * cancelled, whether or not the invoker honours the abort signal.
 */

import type { NodeError } from '@docweave/shared';
import { MAX_TIMEOUT_MS } from '@docweave/planner';
import { InvocationError, isTransientError, toNodeError } from './invocation-errors.js';
import type { ModelCall, ModelInvoker, RetryPolicy } from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  backoffBaseMs: 250,
};

export interface AttemptHooks {
  onAttempt?: (attempt: number) => void;
  onRetry?: (attempt: number, waitMs: number, error: NodeError) => void;
}

/**
 * Backoff before retry number `attempt` (1-based): base × 2^(attempt-1).
 */
export function backoffDelay(attempt: number, backoffBaseMs: number): number {
  return backoffBaseMs * 2 ** (attempt - 1);
}

/**
 * Run a single attempt. Rejects with a `timeout` InvocationError when
 * `timeoutMs` elapses and with a `cancelled` one when `runSignal` aborts.
 */
export function invokeOnce(
  invoke: ModelInvoker,
  call: Omit<ModelCall, 'signal'>,
  runSignal: AbortSignal
): Promise<string> {
  if (runSignal.aborted) {
    return Promise.reject(cancelledError(runSignal));
  }

  return new Promise<string>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      runSignal.removeEventListener('abort', onRunAbort);
      settle();
    };

    const onRunAbort = (): void => {
      controller.abort(runSignal.reason);
      finish(() => reject(cancelledError(runSignal)));
    };

    const timer = setTimeout(() => {
      const error = new InvocationError('timeout', `Model call for "${call.nodeId}" timed out after ${call.timeoutMs}ms`);
      controller.abort(error);
      finish(() => reject(error));
    }, Math.min(call.timeoutMs, MAX_TIMEOUT_MS));

    runSignal.addEventListener('abort', onRunAbort, { once: true });

    Promise.resolve()
      .then(() => invoke({ ...call, signal: controller.signal }))
      .then(
        output => finish(() => resolve(output)),
        err => finish(() => reject(err))
      );
  });
}

/**
 * Invoke with retries. Transient errors are retried up to
 * `policy.maxRetries` times; permanent errors and cancellation are not.
 */
export async function invokeWithRetry(
  invoke: ModelInvoker,
  call: Omit<ModelCall, 'signal'>,
  runSignal: AbortSignal,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: AttemptHooks = {}
): Promise<string> {
  for (let attempt = 1; ; attempt++) {
    if (runSignal.aborted) throw cancelledError(runSignal);

    hooks.onAttempt?.(attempt);
    try {
      return await invokeOnce(invoke, call, runSignal);
    } catch (err) {
      if (runSignal.aborted) throw cancelledError(runSignal);
      if (attempt > policy.maxRetries || !isTransientError(err)) throw err;

      const waitMs = backoffDelay(attempt, policy.backoffBaseMs);
      hooks.onRetry?.(attempt, waitMs, toNodeError(err));
      await sleep(waitMs, runSignal);
    }
  }
}

/**
 * Resolves after `ms`, or early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function cancelledError(signal: AbortSignal): InvocationError {
  const reason = typeof signal.reason === 'string' ? signal.reason : 'run cancelled';
  return new InvocationError('cancelled', reason);
}
