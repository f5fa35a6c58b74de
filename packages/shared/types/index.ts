/**
 * docweave Shared Types
 *
 * The workflow descriptor and the execution report are the contract between
 * the planner, the runner and everything outside them (CLI, dashboard, batch
 * jobs). These types define that contract across all packages.
 */

// ─── Operations & Patterns ────────────────────────────────────────

export type OperationKind =
  | 'extract'
  | 'summarize'
  | 'compare'
  | 'synthesize'
  | 'classify'
  | 'verify'
  | 'refine'
  | 'answer';

export const OPERATION_KINDS: readonly OperationKind[] = [
  'extract', 'summarize', 'compare', 'synthesize', 'classify', 'verify', 'refine', 'answer',
];

export type PatternType =
  | 'simple_qa'
  | 'multi_document_compare'
  | 'research_synthesis'
  | 'fact_checking'
  | 'summarize_then_extract'
  | 'iterative_refine';

export const PATTERN_TYPES: readonly PatternType[] = [
  'simple_qa',
  'multi_document_compare',
  'research_synthesis',
  'fact_checking',
  'summarize_then_extract',
  'iterative_refine',
];

export function isOperationKind(value: unknown): value is OperationKind {
  return typeof value === 'string' && OPERATION_KINDS.some(k => k === value);
}

export function isPatternType(value: unknown): value is PatternType {
  return typeof value === 'string' && PATTERN_TYPES.some(t => t === value);
}

// ─── Workflow Descriptor (serialized WorkflowSpec) ────────────────
// Field names are snake_case and load-bearing: existing consumers read them.

export interface DagNodeDescriptor {
  node_id: string;
  operation: OperationKind;
  model_id: string;
  instruction: string;
  input_from: string[];
  parallel_group: string | null;
  timeout_ms?: number;
  estimated_latency_seconds?: number;
  estimated_cost_units?: number;
}

export interface ExecutionPlanDescriptor {
  max_parallel_nodes: number;
  total_estimated_time_seconds: number;
  enable_streaming: boolean;
}

export interface WorkflowDescriptor {
  workflow_id: string;
  pattern_type: PatternType;
  pattern_name: string;
  description: string;
  complexity_score: number;
  estimated_cost_factor: number;
  query: string;
  files: string[];
  profile: string;
  created_at: string;
  dag_nodes: DagNodeDescriptor[];
  execution_plan: ExecutionPlanDescriptor;
}

// ─── Node Results (runner writes, all read) ───────────────────────

export type NodeStatus = 'pending' | 'ready' | 'running' | 'succeeded' | 'failed' | 'skipped';
export type TerminalNodeStatus = 'succeeded' | 'failed' | 'skipped';

export type NodeErrorKind =
  | 'timeout'
  | 'rate_limited'
  | 'connection'
  | 'invalid_request'
  | 'cancelled'
  | 'unknown';

export interface NodeError {
  kind: NodeErrorKind;
  message: string;
}

export interface NodeResult {
  nodeId: string;
  status: NodeStatus;
  output: string;           // empty unless succeeded
  error?: NodeError;        // present iff failed
  attempts: number;         // model invocations made, retries included
  startedAt: string | null;
  finishedAt: string | null;
}

// ─── Execution Report ─────────────────────────────────────────────

export type RunStatus = 'succeeded' | 'partial' | 'failed';

export interface RunMetrics {
  invocations: number;
  retries: number;
  peakConcurrency: number;
  estimatedCostUsd: number;
}

export type LogLevel = 'info' | 'warn' | 'error';

export interface RunLogEntry {
  at: string;
  level: LogLevel;
  nodeId: string | null;
  message: string;
}

export interface ExecutionReport {
  runId: string;
  workflowId: string;
  status: RunStatus;
  cancelled: boolean;
  nodes: NodeResult[];                // workflow creation order
  outputs: Record<string, string>;    // succeeded nodes only
  finalOutput: string | null;         // last leaf node, if it succeeded
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  metrics: RunMetrics;
  log: RunLogEntry[];
}

// ─── Event Bus ────────────────────────────────────────────────────

export interface EventPayloads {
  'workflow.compiled': {
    workflowId: string;
    patternType: PatternType;
    nodeCount: number;
    totalEstimatedTimeSeconds: number;
  };
  'run.started': {
    runId: string;
    workflowId: string;
    nodeCount: number;
    maxParallelNodes: number;
  };
  'run.node_started': {
    runId: string;
    nodeId: string;
    modelId: string;
    attempt: number;
  };
  'run.node_retry': {
    runId: string;
    nodeId: string;
    attempt: number;
    waitMs: number;
    error: NodeError;
  };
  'run.node_completed': {
    runId: string;
    nodeId: string;
    status: TerminalNodeStatus;
    durationMs: number;
    error?: NodeError;
  };
  'run.node_output': {
    runId: string;
    nodeId: string;
    output: string;
  };
  'run.completed': {
    runId: string;
    workflowId: string;
    status: RunStatus;
    cancelled: boolean;
    durationMs: number;
    succeeded: number;
    failed: number;
    skipped: number;
  };
}

export type EventChannel = keyof EventPayloads;

export type EventSource = 'planner' | 'runner' | 'cli' | 'dashboard';

export interface BusEvent<T = unknown> {
  channel: EventChannel;
  timestamp: string;
  source: EventSource;
  runId: string | null;
  workflowId: string | null;
  payload: T;
}

export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;
