/**
 * DAG Executor — Run a compiled workflow against a model invoker
 *
 * Worker-pool scheduling over the workflow DAG:
 * - roots are ready at start; a node enters the ready queue exactly once,
 *   when its last upstream node reaches a terminal state
 * - at most `maxParallelNodes` invocations are in flight
 * - a node whose upstream failed or was skipped is skipped, never invoked
 * - cancellation settles running nodes as failed (`cancelled`) and skips
 *   everything not yet started
 *
 * Node failures never throw out of execute(): the caller always gets a
 * complete ExecutionReport.
 *
 * Integration:
 * - EventBus: run.started, run.node_started, run.node_retry,
 *   run.node_completed, run.node_output, run.completed
 * - RunSink: each finished report is handed to every configured sink
 */

import { randomUUID } from 'crypto';
import { createEvent } from '@docweave/shared';
import type {
  BusEvent,
  EventBus,
  ExecutionReport,
  LogLevel,
  NodeError,
  NodeResult,
  RunLogEntry,
  RunStatus,
  TerminalNodeStatus,
} from '@docweave/shared';
import { dependentsOf, leafNodes, roundUsd, DEFAULT_BASE_UNIT_COST_USD } from '@docweave/planner';
import type { DagNode, WorkflowSpec } from '@docweave/planner';
import { DEFAULT_RETRY_POLICY, invokeWithRetry } from './invocation.js';
import { toNodeError } from './invocation-errors.js';
import type { ExecutionHandle, ExecutorOptions, ModelInvoker, RetryPolicy } from './types.js';

export function generateRunId(): string {
  return `run_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export class DagExecutor {
  private invoke: ModelInvoker;
  private defaults: ExecutorOptions;

  constructor(invoke: ModelInvoker, defaults: ExecutorOptions = {}) {
    this.invoke = invoke;
    this.defaults = defaults;
  }

  /**
   * Start a run and return a handle to cancel or await it.
   */
  start(spec: WorkflowSpec, options: ExecutorOptions = {}): ExecutionHandle {
    const run = new WorkflowRun(spec, this.invoke, { ...this.defaults, ...options });
    return {
      runId: run.runId,
      cancel: (reason?: string) => run.cancel(reason),
      done: run.execute(),
    };
  }

  /**
   * Run to completion.
   */
  execute(spec: WorkflowSpec, options: ExecutorOptions = {}): Promise<ExecutionReport> {
    return this.start(spec, options).done;
  }
}

/**
 * One-call form of DagExecutor.execute().
 */
export function execute(
  spec: WorkflowSpec,
  invoke: ModelInvoker,
  options: ExecutorOptions = {}
): Promise<ExecutionReport> {
  return new DagExecutor(invoke).execute(spec, options);
}

// ─── Run State ───────────────────────────────────────────────────

class WorkflowRun {
  readonly runId: string;

  private spec: WorkflowSpec;
  private invoke: ModelInvoker;
  private options: ExecutorOptions;
  private policy: RetryPolicy;
  private bus: EventBus | null;
  private maxParallel: number;

  private controller = new AbortController();
  private nodes = new Map<string, DagNode>();
  private results = new Map<string, NodeResult>();
  private remaining = new Map<string, number>();
  private blocked = new Set<string>();
  private dependents: Map<string, string[]>;
  private outputs = new Map<string, string>();
  private readyQueue: string[] = [];
  private running = 0;
  private cancelled = false;
  private onIdle: (() => void) | null = null;

  private invocations = 0;
  private retries = 0;
  private peakConcurrency = 0;
  private log: RunLogEntry[] = [];
  private pendingEvents: Promise<void>[] = [];

  constructor(spec: WorkflowSpec, invoke: ModelInvoker, options: ExecutorOptions) {
    this.runId = options.runId ?? generateRunId();
    this.spec = spec;
    this.invoke = invoke;
    this.options = options;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.bus = options.bus ?? null;
    this.maxParallel = Math.max(1, spec.executionPlan.maxParallelNodes);
    this.dependents = dependentsOf(spec.nodes);

    for (const node of spec.nodes) {
      this.nodes.set(node.nodeId, node);
      this.remaining.set(node.nodeId, node.inputFrom.length);
      this.results.set(node.nodeId, {
        nodeId: node.nodeId,
        status: 'pending',
        output: '',
        attempts: 0,
        startedAt: null,
        finishedAt: null,
      });
    }

    if (options.signal) {
      if (options.signal.aborted) {
        this.cancel(abortReason(options.signal));
      } else {
        options.signal.addEventListener('abort', () => this.cancel(abortReason(options.signal)), { once: true });
      }
    }
  }

  cancel(reason = 'run cancelled'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.addLog('warn', null, `Cancelled: ${reason}`);
    this.controller.abort(reason);

    for (const nodeId of this.readyQueue.splice(0)) {
      this.skip(nodeId, 'run cancelled');
    }
    this.checkIdle();
  }

  async execute(): Promise<ExecutionReport> {
    const startedAt = new Date();

    this.addLog('info', null, `Run ${this.runId} started: ${this.spec.nodes.length} nodes, up to ${this.maxParallel} in parallel`);
    this.publish(createEvent('run.started', 'runner', {
      runId: this.runId,
      workflowId: this.spec.workflowId,
      nodeCount: this.spec.nodes.length,
      maxParallelNodes: this.maxParallel,
    }, this.eventScope()));

    await new Promise<void>(resolve => {
      this.onIdle = resolve;
      for (const node of this.spec.nodes) {
        if (node.inputFrom.length === 0 && this.results.get(node.nodeId)?.status === 'pending') {
          this.release(node.nodeId);
        }
      }
      this.pump();
    });

    const finishedAt = new Date();
    const report = this.buildReport(startedAt, finishedAt);

    this.publish(createEvent('run.completed', 'runner', {
      runId: this.runId,
      workflowId: this.spec.workflowId,
      status: report.status,
      cancelled: report.cancelled,
      durationMs: report.durationMs,
      succeeded: countStatus(report.nodes, 'succeeded'),
      failed: countStatus(report.nodes, 'failed'),
      skipped: countStatus(report.nodes, 'skipped'),
    }, this.eventScope()));

    await Promise.all(this.pendingEvents);

    for (const sink of this.options.sinks ?? []) {
      try {
        await sink.record(report, this.spec);
      } catch (err) {
        console.error(`[runner] Run sink failed for ${this.runId}:`, err);
        report.log.push(logEntry('error', null, `Run sink failed: ${toNodeError(err).message}`));
      }
    }

    return report;
  }

  // ─── Scheduling ────────────────────────────────────────────────

  /** All upstream nodes are terminal: queue the node or skip it. */
  private release(nodeId: string): void {
    if (this.cancelled) {
      this.skip(nodeId, 'run cancelled');
    } else if (this.blocked.has(nodeId)) {
      this.skip(nodeId, 'upstream node did not succeed');
    } else {
      this.setStatus(nodeId, 'ready');
      this.readyQueue.push(nodeId);
    }
  }

  private pump(): void {
    while (!this.cancelled && this.running < this.maxParallel && this.readyQueue.length > 0) {
      const nodeId = this.readyQueue.shift();
      if (nodeId !== undefined) this.launch(nodeId);
    }
    this.checkIdle();
  }

  private checkIdle(): void {
    if (this.running === 0 && this.readyQueue.length === 0 && this.onIdle) {
      const resolve = this.onIdle;
      this.onIdle = null;
      resolve();
    }
  }

  private launch(nodeId: string): void {
    const node = this.nodes.get(nodeId);
    const result = this.results.get(nodeId);
    if (!node || !result) return;

    this.running++;
    this.peakConcurrency = Math.max(this.peakConcurrency, this.running);
    result.status = 'running';
    result.startedAt = new Date().toISOString();

    this.runNode(node, result).then(
      () => this.pump(),
      err => {
        console.error(`[runner] Unexpected error running node ${nodeId}:`, err);
        this.pump();
      }
    );
  }

  private async runNode(node: DagNode, result: NodeResult): Promise<void> {
    const upstreamOutputs = node.inputFrom.map(dep => this.outputs.get(dep) ?? '');

    try {
      const output = await invokeWithRetry(
        this.invoke,
        {
          nodeId: node.nodeId,
          modelId: node.modelId,
          instruction: node.instruction,
          upstreamOutputs,
          timeoutMs: node.timeoutMs,
        },
        this.controller.signal,
        this.policy,
        {
          onAttempt: attempt => {
            result.attempts = attempt;
            this.invocations++;
            this.addLog('info', node.nodeId, `Invoking ${node.modelId} (attempt ${attempt})`);
            this.publish(createEvent('run.node_started', 'runner', {
              runId: this.runId,
              nodeId: node.nodeId,
              modelId: node.modelId,
              attempt,
            }, this.eventScope()));
          },
          onRetry: (attempt, waitMs, error) => {
            this.retries++;
            this.addLog('warn', node.nodeId, `Attempt ${attempt} failed (${error.kind}: ${error.message}), retrying in ${waitMs}ms`);
            this.publish(createEvent('run.node_retry', 'runner', {
              runId: this.runId,
              nodeId: node.nodeId,
              attempt,
              waitMs,
              error,
            }, this.eventScope()));
          },
        }
      );
      this.finishNode(node.nodeId, 'succeeded', output);
    } catch (err) {
      this.finishNode(node.nodeId, 'failed', '', toNodeError(err));
    }
  }

  private finishNode(nodeId: string, status: 'succeeded' | 'failed', output: string, error?: NodeError): void {
    const result = this.results.get(nodeId);
    if (!result) return;

    this.running--;
    result.status = status;
    result.output = output;
    result.finishedAt = new Date().toISOString();
    if (error) result.error = error;

    const durationMs = result.startedAt
      ? Date.parse(result.finishedAt) - Date.parse(result.startedAt)
      : 0;

    if (status === 'succeeded') {
      this.outputs.set(nodeId, output);
      this.addLog('info', nodeId, `Succeeded in ${durationMs}ms`);
      if (this.spec.executionPlan.enableStreaming) this.stream(nodeId, output);
    } else {
      this.addLog('error', nodeId, `Failed: ${error?.kind ?? 'unknown'}: ${error?.message ?? ''}`);
    }

    this.publish(createEvent('run.node_completed', 'runner', {
      runId: this.runId,
      nodeId,
      status,
      durationMs,
      ...(error ? { error } : {}),
    }, this.eventScope()));

    this.settleDependents(nodeId, status !== 'succeeded');
  }

  private skip(nodeId: string, reason: string): void {
    const result = this.results.get(nodeId);
    if (!result) return;

    result.status = 'skipped';
    result.finishedAt = new Date().toISOString();
    this.addLog('info', nodeId, `Skipped: ${reason}`);
    this.publish(createEvent('run.node_completed', 'runner', {
      runId: this.runId,
      nodeId,
      status: 'skipped',
      durationMs: 0,
    }, this.eventScope()));

    this.settleDependents(nodeId, true);
  }

  private settleDependents(nodeId: string, failedUpstream: boolean): void {
    for (const dep of this.dependents.get(nodeId) ?? []) {
      if (failedUpstream) this.blocked.add(dep);
      const left = (this.remaining.get(dep) ?? 0) - 1;
      this.remaining.set(dep, left);
      if (left === 0) this.release(dep);
    }
  }

  private stream(nodeId: string, output: string): void {
    try {
      this.options.onNodeOutput?.(nodeId, output);
    } catch (err) {
      console.error(`[runner] onNodeOutput callback failed for ${nodeId}:`, err);
    }
    this.publish(createEvent('run.node_output', 'runner', {
      runId: this.runId,
      nodeId,
      output,
    }, this.eventScope()));
  }

  // ─── Reporting ─────────────────────────────────────────────────

  private buildReport(startedAt: Date, finishedAt: Date): ExecutionReport {
    const nodes = this.spec.nodes.map(node => {
      const result = this.results.get(node.nodeId);
      return result ? { ...result } : {
        nodeId: node.nodeId,
        status: 'skipped' as const,
        output: '',
        attempts: 0,
        startedAt: null,
        finishedAt: null,
      };
    });

    const base = this.options.baseUnitCostUsd ?? DEFAULT_BASE_UNIT_COST_USD;
    const estimatedCostUsd = this.spec.nodes.reduce((sum, node) => {
      const attempts = this.results.get(node.nodeId)?.attempts ?? 0;
      return attempts > 0 ? sum + node.estimatedCostUnits * base : sum;
    }, 0);

    const leaves = leafNodes(this.spec.nodes);
    const lastLeaf = leaves[leaves.length - 1];
    const finalOutput = lastLeaf ? this.outputs.get(lastLeaf.nodeId) ?? null : null;

    return {
      runId: this.runId,
      workflowId: this.spec.workflowId,
      status: runStatus(nodes),
      cancelled: this.cancelled,
      nodes,
      outputs: Object.fromEntries(this.outputs),
      finalOutput,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      metrics: {
        invocations: this.invocations,
        retries: this.retries,
        peakConcurrency: this.peakConcurrency,
        estimatedCostUsd: roundUsd(estimatedCostUsd),
      },
      log: this.log,
    };
  }

  private setStatus(nodeId: string, status: 'ready'): void {
    const result = this.results.get(nodeId);
    if (result) result.status = status;
  }

  private addLog(level: LogLevel, nodeId: string | null, message: string): void {
    this.log.push(logEntry(level, nodeId, message));
  }

  private publish(event: BusEvent): void {
    if (this.bus) this.pendingEvents.push(this.bus.emit(event));
  }

  private eventScope(): { runId: string; workflowId: string } {
    return { runId: this.runId, workflowId: this.spec.workflowId };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────

export function runStatus(nodes: readonly NodeResult[]): RunStatus {
  const succeeded = countStatus(nodes, 'succeeded');
  if (succeeded === nodes.length) return 'succeeded';
  return succeeded > 0 ? 'partial' : 'failed';
}

function countStatus(nodes: readonly NodeResult[], status: TerminalNodeStatus): number {
  return nodes.filter(n => n.status === status).length;
}

function logEntry(level: LogLevel, nodeId: string | null, message: string): RunLogEntry {
  return { at: new Date().toISOString(), level, nodeId, message };
}

function abortReason(signal: AbortSignal | undefined): string {
  return typeof signal?.reason === 'string' ? signal.reason : 'run cancelled';
}
