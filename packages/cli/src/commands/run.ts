/**
 * docweave run — Execute a workflow file
 *
 * Model invoker priority:
 *   1. an invoker passed in programmatically
 *   2. --mock → deterministic offline invoker
 *   3. DOCWEAVE_INVOKER_URL / config.json invokerUrl → HTTP invoker
 *
 * The finished run is recorded in the run store. When the workflow's plan
 * enables streaming, node outputs are logged as they arrive.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { EventBus, RunStore } from '@docweave/shared';
import type { ExecutionReport } from '@docweave/shared';
import { parseWorkflowDescriptor } from '@docweave/planner';
import {
  DagExecutor,
  createHttpInvoker,
  createMockInvoker,
  createRunStoreSink,
} from '@docweave/runner';
import type { ModelInvoker, RetryPolicy } from '@docweave/runner';
import { loadConfig } from '../config.js';
import type { DocweaveConfig } from '../config.js';
import { formatExecution } from './results.js';

export interface RunResult {
  ok: boolean;
  execution: ExecutionReport | null;
  errors: string[];
  report: string;
}

export interface RunOptions {
  mock?: boolean;
  invoke?: ModelInvoker;
  signal?: AbortSignal;
  retry?: Partial<RetryPolicy>;
  config?: DocweaveConfig;
  bus?: EventBus;
  /** Progress lines as nodes finish, plus node outputs for streaming plans. */
  log?: (line: string) => void;
}

export async function run(workflowFile: string, opts?: RunOptions): Promise<RunResult> {
  const config = opts?.config ?? loadConfig();
  const fail = (errors: string[]): RunResult => ({
    ok: false, execution: null, errors,
    report: ['', 'Run failed to start:', ...errors.map(e => `  - ${e}`), ''].join('\n'),
  });

  const path = resolve(workflowFile);
  if (!existsSync(path)) {
    return fail([`Workflow file not found: ${path}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    return fail([`Failed to parse workflow JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }

  const parsed = parseWorkflowDescriptor(raw);
  if (!parsed.ok) return fail(parsed.errors);

  const invoke = opts?.invoke
    ?? (opts?.mock ? createMockInvoker() : config.invokerUrl ? createHttpInvoker(config.invokerUrl) : null);
  if (!invoke) {
    return fail(['No model invoker configured: set DOCWEAVE_INVOKER_URL or pass --mock']);
  }

  const bus = opts?.bus ?? new EventBus();
  const log = opts?.log;
  const unsubscribe = log
    ? bus.on('run.node_completed', event => {
      const { nodeId, status, durationMs, error } = event.payload;
      log(`  ${status.padEnd(9)} ${nodeId}${status === 'skipped' ? '' : ` (${durationMs}ms)`}${error ? `: ${error.kind}: ${error.message}` : ''}`);
    })
    : null;
  const unsubscribeOutput = log && parsed.spec.executionPlan.enableStreaming
    ? bus.on('run.node_output', event => {
      log(`  output    ${event.payload.nodeId}: ${event.payload.output}`);
    })
    : null;

  const store = new RunStore(config.dbPath);
  try {
    const executor = new DagExecutor(invoke, {
      bus,
      sinks: [createRunStoreSink(store)],
      baseUnitCostUsd: config.baseUnitCostUsd,
      retry: opts?.retry,
      signal: opts?.signal,
    });

    const execution = await executor.execute(parsed.spec);
    return {
      ok: execution.status === 'succeeded',
      execution,
      errors: [],
      report: formatExecution(execution, 'text'),
    };
  } finally {
    unsubscribe?.();
    unsubscribeOutput?.();
    store.close();
  }
}
