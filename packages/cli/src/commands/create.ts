/**
 * docweave create — Compile a query into a workflow file
 *
 * 0. Expands glob patterns in --files and checks every file exists
 * 1. Resolves the profile (built-in name or YAML path), applying --parallel
 * 2. Classifies the query and compiles the winning pattern
 * 3. Writes the workflow descriptor (JSON) unless --dry-run
 * 4. Saves the workflow to the run store and emits workflow.compiled
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { glob, hasMagic } from 'glob';
import { RunStore, createEvent } from '@docweave/shared';
import type { EventBus, WorkflowDescriptor } from '@docweave/shared';
import {
  createWorkflowFromQuery,
  estimateWorkflowCost,
  toWorkflowDescriptor,
  withMaxParallel,
} from '@docweave/planner';
import type { WorkflowSpec } from '@docweave/planner';
import { loadConfig, resolveProfile } from '../config.js';
import type { DocweaveConfig } from '../config.js';
import { formatNode, formatUsd, formatWorkflowSummary } from '../utils.js';

export interface CreateResult {
  ok: boolean;
  spec: WorkflowSpec | null;
  descriptor: WorkflowDescriptor | null;
  outputPath: string | null;
  errors: string[];
  report: string;
}

export interface CreateOptions {
  query: string;
  files: string[];
  profile?: string;
  parallel?: number;
  output?: string;
  dryRun?: boolean;
  config?: DocweaveConfig;
  bus?: EventBus;
}

export async function create(opts: CreateOptions): Promise<CreateResult> {
  const config = opts.config ?? loadConfig();
  const fail = (errors: string[]): CreateResult => ({
    ok: false, spec: null, descriptor: null, outputPath: null, errors,
    report: ['', 'Workflow creation failed:', ...errors.map(e => `  - ${e}`), ''].join('\n'),
  });

  if (opts.query.trim() === '') {
    return fail(['--query must not be empty']);
  }
  if (opts.parallel !== undefined && (!Number.isInteger(opts.parallel) || opts.parallel < 1)) {
    return fail([`--parallel must be a positive integer (got ${opts.parallel})`]);
  }

  const expanded = await expandFiles(opts.files);
  if (!expanded.ok) return fail(expanded.errors);

  const profileResult = resolveProfile(opts.profile ?? config.defaultProfile);
  if (!profileResult.ok) return fail(profileResult.errors);

  const profile = opts.parallel !== undefined
    ? withMaxParallel(profileResult.profile, opts.parallel)
    : profileResult.profile;

  const result = createWorkflowFromQuery(opts.query, expanded.files, profile);
  if (!result.ok) {
    return fail(result.errors.map(e => `${e.code}: ${e.message}`));
  }

  const spec = result.spec;
  const descriptor = toWorkflowDescriptor(spec);
  const cost = estimateWorkflowCost(spec, config.baseUnitCostUsd);

  let outputPath: string | null = null;
  if (!opts.dryRun) {
    outputPath = resolve(opts.output ?? join(config.home, 'workflows', `${spec.workflowId}.json`));
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(descriptor, null, 2) + '\n');

    const store = new RunStore(config.dbPath);
    try {
      store.saveWorkflow(descriptor);
    } finally {
      store.close();
    }
  }

  if (opts.bus) {
    await opts.bus.emit(createEvent('workflow.compiled', 'cli', {
      workflowId: spec.workflowId,
      patternType: spec.pattern.type,
      nodeCount: spec.nodes.length,
      totalEstimatedTimeSeconds: spec.executionPlan.totalEstimatedTimeSeconds,
    }, { workflowId: spec.workflowId }));
  }

  const report = [
    '',
    `=== docweave Workflow${opts.dryRun ? ' (dry run)' : ''} ===`,
    '',
    ...formatWorkflowSummary(spec),
    `  Estimated cost:  ${formatUsd(cost.patternCostUsd)}`,
    '',
    '  DAG:',
    ...spec.nodes.map(n => `    ${formatNode(n)}`),
    '',
    outputPath ? `  Written to: ${outputPath}` : '  Dry run: nothing written.',
    '',
  ].join('\n');

  return { ok: true, spec, descriptor, outputPath, errors: [], report };
}

// ─── File expansion ──────────────────────────────────────────────

type ExpandResult = { ok: true; files: string[] } | { ok: false; errors: string[] };

/**
 * Glob patterns expand to their sorted matches; plain paths must exist.
 * Every bad entry is reported, not just the first.
 */
export async function expandFiles(patterns: readonly string[]): Promise<ExpandResult> {
  const files: string[] = [];
  const errors: string[] = [];

  for (const pattern of patterns) {
    if (hasMagic(pattern)) {
      const found = await glob(pattern, { nodir: true });
      if (found.length === 0) {
        errors.push(`No files found matching pattern: ${pattern}`);
      }
      files.push(...found.sort());
    } else if (existsSync(pattern)) {
      files.push(pattern);
    } else {
      errors.push(`File not found: ${pattern}`);
    }
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, files };
}
