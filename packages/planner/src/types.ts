/**
 * Planner Types — patterns, profiles and compiled workflows
 *
 * A Pattern is a reusable template for one class of analysis task.
 * An OptimizationProfile decides which model (and which latency/cost
 * estimate) applies to each operation. Compiling a Pattern against a
 * profile yields a WorkflowSpec: a frozen DAG plus its execution plan.
 */

import type { OperationKind, PatternType } from '@docweave/shared';

// ─── Pattern Catalog ─────────────────────────────────────────────

export type FanOut = 'per_file' | 'single';

export interface NodeTemplate {
  key: string;              // node id stem, unique within the template
  operation: OperationKind;
  fanOut: FanOut;
  inputs: string[];         // keys of earlier templates
  instruction: string;      // placeholders: {query} {file} {file_index} {inputs}
  parallelGroup?: string;   // single-node templates may opt into a group
}

export interface Pattern {
  type: PatternType;
  name: string;
  description: string;
  intentKeywords: readonly string[];
  fileTypeHints: readonly string[];   // lower-case, leading dot
  complexityScore: number;            // 0-10
  costFactor: number;                 // multiplier against the baseline unit cost
  streaming: boolean;
  requiresFiles: boolean;
  template: readonly NodeTemplate[];
}

// ─── Classification ──────────────────────────────────────────────

export interface PatternMatch {
  pattern: Pattern;
  score: number;
  matchedKeywords: string[];
  matchedExtensions: string[];
}

// ─── Optimization Profiles ───────────────────────────────────────

export interface OperationSettings {
  modelId: string;
  latencySeconds: number;
  costUnits: number;
  timeoutMs: number;
}

export type OperationTable = Partial<Record<OperationKind, OperationSettings>>;

export interface OptimizationProfile {
  name: string;
  description: string;
  maxParallelNodes: number;
  operations: OperationTable;
}

export type BuiltinProfileName = 'speed' | 'balanced' | 'quality';

// ─── Compiled Workflow ───────────────────────────────────────────

export interface DagNode {
  readonly nodeId: string;
  readonly operation: OperationKind;
  readonly modelId: string;
  readonly instruction: string;
  readonly inputFrom: readonly string[];
  readonly parallelGroup: string | null;
  readonly timeoutMs: number;
  readonly estimatedLatencySeconds: number;
  readonly estimatedCostUnits: number;
}

export interface ExecutionPlan {
  readonly maxParallelNodes: number;
  readonly totalEstimatedTimeSeconds: number;
  readonly enableStreaming: boolean;
}

export interface WorkflowSpec {
  readonly workflowId: string;
  readonly pattern: Pattern;
  readonly query: string;
  readonly files: readonly string[];
  readonly profileName: string;
  readonly nodes: readonly DagNode[];
  readonly executionPlan: ExecutionPlan;
  readonly createdAt: string;
}

// ─── Errors & Results ────────────────────────────────────────────

export type CompileErrorCode = 'missing_files' | 'missing_model' | 'invalid_profile' | 'invalid_dag';

export interface CompileError {
  code: CompileErrorCode;
  message: string;
}

export type CompileResult =
  | { ok: true; spec: WorkflowSpec }
  | { ok: false; errors: CompileError[] };

export type ProfileParseResult =
  | { ok: true; profile: OptimizationProfile }
  | { ok: false; errors: string[] };

export type DescriptorParseResult =
  | { ok: true; spec: WorkflowSpec }
  | { ok: false; errors: string[] };

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface CompileOptions {
  workflowId?: string;   // default: generated wf_<date>_<time>_<hex>
  now?: Date;            // default: current time
}
