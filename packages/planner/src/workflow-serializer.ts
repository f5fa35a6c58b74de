/**
 * Workflow Serializer — WorkflowSpec <-> snake_case WorkflowDescriptor
 *
 * The descriptor is what `create --output` writes and what `run` and the
 * run store read back. Parsing re-applies every DAG invariant, so a
 * hand-edited file cannot smuggle a cycle or a forward reference in.
 */

import { isOperationKind, isPatternType } from '@docweave/shared';
import type { DagNodeDescriptor, WorkflowDescriptor } from '@docweave/shared';
import { PATTERN_CATALOG, getPattern } from './pattern-catalog.js';
import { MAX_TIMEOUT_MS, isValidTimeoutMs } from './profile-parser.js';
import { validateDag } from './dag-builder.js';
import type { DagNode, DescriptorParseResult, Pattern, WorkflowSpec } from './types.js';

export function toWorkflowDescriptor(spec: WorkflowSpec): WorkflowDescriptor {
  return {
    workflow_id: spec.workflowId,
    pattern_type: spec.pattern.type,
    pattern_name: spec.pattern.name,
    description: spec.pattern.description,
    complexity_score: spec.pattern.complexityScore,
    estimated_cost_factor: spec.pattern.costFactor,
    query: spec.query,
    files: [...spec.files],
    profile: spec.profileName,
    created_at: spec.createdAt,
    dag_nodes: spec.nodes.map(toNodeDescriptor),
    execution_plan: {
      max_parallel_nodes: spec.executionPlan.maxParallelNodes,
      total_estimated_time_seconds: spec.executionPlan.totalEstimatedTimeSeconds,
      enable_streaming: spec.executionPlan.enableStreaming,
    },
  };
}

function toNodeDescriptor(node: DagNode): DagNodeDescriptor {
  return {
    node_id: node.nodeId,
    operation: node.operation,
    model_id: node.modelId,
    instruction: node.instruction,
    input_from: [...node.inputFrom],
    parallel_group: node.parallelGroup,
    timeout_ms: node.timeoutMs,
    estimated_latency_seconds: node.estimatedLatencySeconds,
    estimated_cost_units: node.estimatedCostUnits,
  };
}

// ─── Parsing ─────────────────────────────────────────────────────

const DEFAULT_NODE_TIMEOUT_MS = 30_000;

/**
 * Validate a raw object (typically JSON.parse output) into a WorkflowSpec.
 *
 * Only `workflow_id`, `dag_nodes` and `execution_plan` are required. The
 * pattern comes from `pattern_type`, else from a catalog `pattern_name`;
 * `query` and `files` default to empty.
 */
export function parseWorkflowDescriptor(raw: unknown): DescriptorParseResult {
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Workflow descriptor must be an object'] };
  }

  const errors: string[] = [];

  if (typeof raw.workflow_id !== 'string' || raw.workflow_id === '') {
    errors.push('"workflow_id" is required and must be a non-empty string');
  }
  const pattern = resolvePattern(raw);
  if (!pattern) {
    errors.push('"pattern_type" or "pattern_name" must name a catalog pattern');
  }
  if (raw.query !== undefined && typeof raw.query !== 'string') {
    errors.push('"query" must be a string');
  }
  if (raw.files !== undefined && (!Array.isArray(raw.files) || !raw.files.every(f => typeof f === 'string'))) {
    errors.push('"files" must be an array of strings');
  }

  const nodes: DagNode[] = [];
  if (!Array.isArray(raw.dag_nodes) || raw.dag_nodes.length === 0) {
    errors.push('"dag_nodes" must be a non-empty array');
  } else {
    raw.dag_nodes.forEach((value: unknown, i: number) => {
      const parsed = parseNode(value, i);
      errors.push(...parsed.errors);
      if (parsed.node) nodes.push(parsed.node);
    });
  }

  const plan = raw.execution_plan;
  if (!isRecord(plan)) {
    errors.push('"execution_plan" must be an object');
  } else {
    if (!isPositiveInteger(plan.max_parallel_nodes)) {
      errors.push('"execution_plan.max_parallel_nodes" must be a positive integer');
    }
    if (typeof plan.total_estimated_time_seconds !== 'number' || plan.total_estimated_time_seconds < 0) {
      errors.push('"execution_plan.total_estimated_time_seconds" must be a non-negative number');
    }
    if (typeof plan.enable_streaming !== 'boolean') {
      errors.push('"execution_plan.enable_streaming" must be a boolean');
    }
  }

  if (errors.length === 0) {
    errors.push(...validateDag(nodes).errors);
  }

  if (
    errors.length > 0
    || typeof raw.workflow_id !== 'string'
    || !pattern
    || !isRecord(plan)
    || !isPositiveInteger(plan.max_parallel_nodes)
    || typeof plan.total_estimated_time_seconds !== 'number'
    || typeof plan.enable_streaming !== 'boolean'
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    spec: Object.freeze({
      workflowId: raw.workflow_id,
      pattern,
      query: typeof raw.query === 'string' ? raw.query : '',
      files: Object.freeze(stringArray(raw.files)),
      profileName: typeof raw.profile === 'string' ? raw.profile : 'custom',
      nodes: Object.freeze(nodes),
      executionPlan: Object.freeze({
        maxParallelNodes: plan.max_parallel_nodes,
        totalEstimatedTimeSeconds: plan.total_estimated_time_seconds,
        enableStreaming: plan.enable_streaming,
      }),
      createdAt: typeof raw.created_at === 'string' ? raw.created_at : new Date().toISOString(),
    }),
  };
}

function parseNode(raw: unknown, index: number): { node: DagNode | null; errors: string[] } {
  const prefix = `dag_nodes[${index}]`;
  if (!isRecord(raw)) {
    return { node: null, errors: [`${prefix}: must be an object`] };
  }

  const errors: string[] = [];

  if (typeof raw.node_id !== 'string' || raw.node_id === '') {
    errors.push(`${prefix}: "node_id" is required`);
  }
  if (!isOperationKind(raw.operation)) {
    errors.push(`${prefix}: unknown operation "${String(raw.operation)}"`);
  }
  if (typeof raw.model_id !== 'string' || raw.model_id === '') {
    errors.push(`${prefix}: "model_id" is required`);
  }
  if (typeof raw.instruction !== 'string') {
    errors.push(`${prefix}: "instruction" must be a string`);
  }
  if (!Array.isArray(raw.input_from) || !raw.input_from.every(d => typeof d === 'string')) {
    errors.push(`${prefix}: "input_from" must be an array of node ids`);
  }
  if (raw.parallel_group !== null && raw.parallel_group !== undefined && typeof raw.parallel_group !== 'string') {
    errors.push(`${prefix}: "parallel_group" must be a string or null`);
  }
  if (raw.timeout_ms !== undefined && !isValidTimeoutMs(raw.timeout_ms)) {
    errors.push(`${prefix}: "timeout_ms" must be a positive number no greater than ${MAX_TIMEOUT_MS}`);
  }
  for (const field of ['estimated_latency_seconds', 'estimated_cost_units']) {
    const value = raw[field];
    if (value !== undefined && (typeof value !== 'number' || value < 0)) {
      errors.push(`${prefix}: "${field}" must be a non-negative number`);
    }
  }

  if (
    errors.length > 0
    || typeof raw.node_id !== 'string'
    || !isOperationKind(raw.operation)
    || typeof raw.model_id !== 'string'
    || typeof raw.instruction !== 'string'
  ) {
    return { node: null, errors };
  }

  return {
    node: Object.freeze({
      nodeId: raw.node_id,
      operation: raw.operation,
      modelId: raw.model_id,
      instruction: raw.instruction,
      inputFrom: Object.freeze(stringArray(raw.input_from)),
      parallelGroup: typeof raw.parallel_group === 'string' ? raw.parallel_group : null,
      timeoutMs: isValidTimeoutMs(raw.timeout_ms) ? raw.timeout_ms : DEFAULT_NODE_TIMEOUT_MS,
      estimatedLatencySeconds: nonNegativeOr(raw.estimated_latency_seconds, 0),
      estimatedCostUnits: nonNegativeOr(raw.estimated_cost_units, 0),
    }),
    errors,
  };
}

function resolvePattern(raw: Record<string, unknown>): Pattern | null {
  if (isPatternType(raw.pattern_type)) return getPattern(raw.pattern_type);
  if (raw.pattern_type !== undefined) return null;
  return PATTERN_CATALOG.find(p => p.name === raw.pattern_name) ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function nonNegativeOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && value >= 0 ? value : fallback;
}
