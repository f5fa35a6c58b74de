/**
 * DAG Compiler — Expand a pattern template into an executable workflow
 *
 * Per-file templates fan out into one node per input file, all tagged with
 * the same parallel group. Models, timeouts and estimates come from the
 * profile's operation table. Failures are returned, never thrown.
 */

import { randomUUID } from 'crypto';
import { classify } from './pattern-classifier.js';
import { DagBuilder, criticalPath, leafNodes, widestParallelGroup } from './dag-builder.js';
import type {
  CompileError,
  CompileOptions,
  CompileResult,
  DagNode,
  NodeTemplate,
  OptimizationProfile,
  Pattern,
} from './types.js';

/**
 * wf_<yyyymmdd>_<hhmmss>_<8 hex>, UTC.
 */
export function generateWorkflowId(now: Date = new Date()): string {
  const iso = now.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, '');
  const time = iso.slice(11, 19).replace(/:/g, '');
  const suffix = randomUUID().replace(/-/g, '').slice(0, 8);
  return `wf_${date}_${time}_${suffix}`;
}

const PLACEHOLDER = /\{(query|file|file_index|inputs)\}/g;

/**
 * Substitute placeholders in one pass. Values are inserted literally and
 * never rescanned, so a query may itself contain `{file}` or `$&`.
 */
export function renderInstruction(
  template: string,
  values: { query: string; file: string; fileIndex: string; inputs: readonly string[] }
): string {
  const lookup: Record<string, string> = {
    query: values.query,
    file: values.file,
    file_index: values.fileIndex,
    inputs: values.inputs.length > 0 ? values.inputs.join(', ') : 'none',
  };
  return template.replace(PLACEHOLDER, (match: string, key: string) => lookup[key] ?? match);
}

/**
 * Compile a pattern into a WorkflowSpec for the given files and profile.
 */
export function compile(
  pattern: Pattern,
  query: string,
  files: readonly string[],
  profile: OptimizationProfile,
  options: CompileOptions = {}
): CompileResult {
  const errors = checkInputs(pattern, files, profile);
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const builder = new DagBuilder();
  const instantiated = new Map<string, { fanOut: NodeTemplate['fanOut']; nodeIds: string[] }>();

  for (const template of pattern.template) {
    const settings = profile.operations[template.operation];
    if (!settings) continue; // reported by checkInputs

    const unknownInputs = template.inputs.filter(key => !instantiated.has(key));
    if (unknownInputs.length > 0) {
      return {
        ok: false,
        errors: [{
          code: 'invalid_dag',
          message: `Template "${template.key}" reads from undeclared template(s): ${unknownInputs.join(', ')}`,
        }],
      };
    }

    const copies = template.fanOut === 'per_file' ? files.length : 1;
    const nodeIds: string[] = [];

    for (let i = 0; i < copies; i++) {
      const nodeId = template.fanOut === 'per_file' ? `${template.key}_${i + 1}` : template.key;
      const inputFrom = wireInputs(template, i, instantiated);

      const node: DagNode = {
        nodeId,
        operation: template.operation,
        modelId: settings.modelId,
        instruction: renderInstruction(template.instruction, {
          query,
          file: template.fanOut === 'per_file' ? files[i] ?? '' : joinFiles(files),
          fileIndex: template.fanOut === 'per_file' ? String(i + 1) : 'all',
          inputs: inputFrom,
        }),
        inputFrom,
        parallelGroup: template.fanOut === 'per_file'
          ? `${template.key}_group`
          : template.parallelGroup ?? null,
        timeoutMs: settings.timeoutMs,
        estimatedLatencySeconds: settings.latencySeconds,
        estimatedCostUnits: settings.costUnits,
      };

      builder.add(node);
      nodeIds.push(nodeId);
    }

    instantiated.set(template.key, { fanOut: template.fanOut, nodeIds });
  }

  const built = builder.build();
  if (!built.ok) {
    return { ok: false, errors: built.errors.map((message): CompileError => ({ code: 'invalid_dag', message })) };
  }

  const nodes = built.nodes;
  const widest = Math.max(1, widestParallelGroup(nodes));
  const now = options.now ?? new Date();

  return {
    ok: true,
    spec: Object.freeze({
      workflowId: options.workflowId ?? generateWorkflowId(now),
      pattern,
      query,
      files: Object.freeze([...files]),
      profileName: profile.name,
      nodes,
      executionPlan: Object.freeze({
        maxParallelNodes: Math.min(profile.maxParallelNodes, widest),
        totalEstimatedTimeSeconds: criticalPath(nodes).seconds,
        enableStreaming: leafNodes(nodes).length > 1 || pattern.streaming,
      }),
      createdAt: now.toISOString(),
    }),
  };
}

/**
 * Classify the query, then compile the winning pattern.
 */
export function createWorkflowFromQuery(
  query: string,
  files: readonly string[],
  profile: OptimizationProfile,
  options: CompileOptions = {}
): CompileResult {
  return compile(classify(query, files), query, files, profile, options);
}

// ─── Helpers ─────────────────────────────────────────────────────

function checkInputs(pattern: Pattern, files: readonly string[], profile: OptimizationProfile): CompileError[] {
  const errors: CompileError[] = [];

  if (!Number.isInteger(profile.maxParallelNodes) || profile.maxParallelNodes < 1) {
    errors.push({
      code: 'invalid_profile',
      message: `Profile "${profile.name}": maxParallelNodes must be a positive integer (got ${profile.maxParallelNodes})`,
    });
  }

  if (pattern.requiresFiles && files.length === 0) {
    errors.push({
      code: 'missing_files',
      message: `Pattern "${pattern.name}" needs at least one input file`,
    });
  }

  const missing = new Set<string>();
  for (const template of pattern.template) {
    if (!profile.operations[template.operation]) missing.add(template.operation);
  }
  for (const operation of missing) {
    errors.push({
      code: 'missing_model',
      message: `Profile "${profile.name}" has no model for operation "${operation}"`,
    });
  }

  return errors;
}

function wireInputs(
  template: NodeTemplate,
  fileIndex: number,
  instantiated: ReadonlyMap<string, { fanOut: NodeTemplate['fanOut']; nodeIds: string[] }>
): string[] {
  const inputFrom: string[] = [];
  for (const key of template.inputs) {
    const upstream = instantiated.get(key);
    if (!upstream) continue;

    if (template.fanOut === 'per_file' && upstream.fanOut === 'per_file') {
      const paired = upstream.nodeIds[fileIndex];
      if (paired !== undefined) inputFrom.push(paired);
    } else {
      inputFrom.push(...upstream.nodeIds);
    }
  }
  return inputFrom;
}

function joinFiles(files: readonly string[]): string {
  return files.length > 0 ? files.join(', ') : 'the provided context';
}
