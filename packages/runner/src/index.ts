/**
 * @docweave/runner — Execute compiled workflows
 *
 * Bounded-parallel DAG scheduling with per-call timeouts, retries on
 * transient failures, cancellation and pluggable run sinks.
 */

export const VERSION = '0.1.0';

// ─── Executor ────────────────────────────────────────────────────
export { DagExecutor, execute, generateRunId, runStatus } from './dag-executor.js';

// ─── Invocation ──────────────────────────────────────────────────
export { invokeOnce, invokeWithRetry, backoffDelay, sleep, DEFAULT_RETRY_POLICY } from './invocation.js';
export type { AttemptHooks } from './invocation.js';
export {
  InvocationError,
  isTransientError,
  toNodeError,
  kindForStatus,
  TRANSIENT_NETWORK_CODES,
} from './invocation-errors.js';

// ─── Invokers & Sinks ────────────────────────────────────────────
export { createHttpInvoker, createMockInvoker } from './invokers.js';
export type { HttpInvokerOptions, MockInvokerOptions } from './invokers.js';
export { createRunStoreSink, createConsoleSink } from './sinks.js';

// ─── Types ───────────────────────────────────────────────────────
export type {
  ModelCall,
  ModelInvoker,
  RetryPolicy,
  RunSink,
  ExecutorOptions,
  ExecutionHandle,
} from './types.js';
