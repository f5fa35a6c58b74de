/**
 * Runner Types
 *
 * The executor never calls a model itself: the caller hands in a
 * ModelInvoker, the same way a pipeline step executor is injected.
 */

import type { EventBus, ExecutionReport } from '@docweave/shared';
import type { WorkflowSpec } from '@docweave/planner';

// ─── Model Invocation ────────────────────────────────────────────

export interface ModelCall {
  nodeId: string;
  modelId: string;
  instruction: string;
  upstreamOutputs: string[];   // in the node's inputFrom order
  timeoutMs: number;
  signal: AbortSignal;         // aborted on timeout or run cancellation
}

export type ModelInvoker = (call: ModelCall) => Promise<string>;

// ─── Options ─────────────────────────────────────────────────────

export interface RetryPolicy {
  maxRetries: number;      // default 2
  backoffBaseMs: number;   // default 250; wait = base × 2^(attempt-1)
}

export interface RunSink {
  record(report: ExecutionReport, spec: WorkflowSpec): void | Promise<void>;
}

export interface ExecutorOptions {
  signal?: AbortSignal;
  bus?: EventBus;
  sinks?: RunSink[];
  retry?: Partial<RetryPolicy>;
  baseUnitCostUsd?: number;
  runId?: string;
  /** Called as each node succeeds when the plan enables streaming. */
  onNodeOutput?: (nodeId: string, output: string) => void;
}

export interface ExecutionHandle {
  runId: string;
  cancel(reason?: string): void;
  done: Promise<ExecutionReport>;
}
