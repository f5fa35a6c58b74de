import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { EventBus, RunStore, createEvent, isOperationKind, isPatternType } from '@docweave/shared';
import type { BusEvent, ExecutionReport, WorkflowDescriptor } from '@docweave/shared';

// ─── Fixtures ────────────────────────────────────────────────────

function descriptor(workflowId: string, createdAt = '2026-03-01T10:00:00.000Z'): WorkflowDescriptor {
  return {
    workflow_id: workflowId,
    pattern_type: 'multi_document_compare',
    pattern_name: 'Comparative Analysis',
    description: 'compare two reports',
    complexity_score: 6,
    estimated_cost_factor: 2.5,
    query: 'Compare these two reports',
    files: ['a.pdf', 'b.pdf'],
    profile: 'balanced',
    created_at: createdAt,
    dag_nodes: [
      { node_id: 'extract_1', operation: 'extract', model_id: 'model-small', instruction: 'x', input_from: [], parallel_group: 'extract_group' },
      { node_id: 'extract_2', operation: 'extract', model_id: 'model-small', instruction: 'x', input_from: [], parallel_group: 'extract_group' },
      { node_id: 'compare', operation: 'compare', model_id: 'model-large', instruction: 'x', input_from: ['extract_1', 'extract_2'], parallel_group: null },
    ],
    execution_plan: { max_parallel_nodes: 2, total_estimated_time_seconds: 23, enable_streaming: false },
  };
}

function report(runId: string, workflowId: string, overrides: Partial<ExecutionReport> = {}): ExecutionReport {
  return {
    runId,
    workflowId,
    status: 'partial',
    cancelled: false,
    nodes: [
      { nodeId: 'extract_1', status: 'succeeded', output: 'facts from a', attempts: 1, startedAt: '2026-03-01T10:00:01.000Z', finishedAt: '2026-03-01T10:00:02.000Z' },
      { nodeId: 'extract_2', status: 'failed', output: '', error: { kind: 'timeout', message: 'timed out after 30000ms' }, attempts: 3, startedAt: '2026-03-01T10:00:01.000Z', finishedAt: '2026-03-01T10:00:05.000Z' },
      { nodeId: 'compare', status: 'skipped', output: '', attempts: 0, startedAt: null, finishedAt: '2026-03-01T10:00:05.000Z' },
    ],
    outputs: { extract_1: 'facts from a' },
    finalOutput: null,
    startedAt: '2026-03-01T10:00:00.000Z',
    finishedAt: '2026-03-01T10:00:05.000Z',
    durationMs: 5000,
    metrics: { invocations: 4, retries: 2, peakConcurrency: 2, estimatedCostUsd: 0.15 },
    log: [{ at: '2026-03-01T10:00:00.000Z', level: 'info', nodeId: null, message: 'started' }],
    ...overrides,
  };
}

// ─── Type Guards ─────────────────────────────────────────────────

describe('type guards', () => {
  it('recognizes the closed operation and pattern sets', () => {
    expect(isOperationKind('compare')).toBe(true);
    expect(isOperationKind('translate')).toBe(false);
    expect(isOperationKind(42)).toBe(false);
    expect(isPatternType('fact_checking')).toBe(true);
    expect(isPatternType('Fact Checking')).toBe(false);
  });
});

// ─── EventBus ────────────────────────────────────────────────────

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  afterEach(() => {
    bus.clear();
  });

  it('delivers typed payloads to channel subscribers', async () => {
    const received: string[] = [];
    bus.on('run.node_output', event => { received.push(`${event.payload.nodeId}=${event.payload.output}`); });

    await bus.emit(createEvent('run.node_output', 'runner', { runId: 'run_1', nodeId: 'extract_1', output: 'hello' }));

    expect(received).toEqual(['extract_1=hello']);
  });

  it('prefix and wildcard subscribers see matching events in subscription order', async () => {
    const order: string[] = [];
    bus.on('*', e => { order.push(`all:${e.channel}`); });
    bus.on('run.*', e => { order.push(`run:${e.channel}`); });
    bus.on('workflow.*', e => { order.push(`workflow:${e.channel}`); });

    await bus.emit(createEvent('run.started', 'runner', { runId: 'r', workflowId: 'w', nodeCount: 1, maxParallelNodes: 1 }));
    await bus.emit(createEvent('workflow.compiled', 'planner', {
      workflowId: 'w', patternType: 'simple_qa', nodeCount: 1, totalEstimatedTimeSeconds: 10,
    }));

    expect(order).toEqual([
      'all:run.started',
      'run:run.started',
      'all:workflow.compiled',
      'workflow:workflow.compiled',
    ]);
  });

  it('once() fires only once and unsubscribe stops delivery', async () => {
    let onceCount = 0;
    let count = 0;
    bus.once('run.completed', () => { onceCount++; });
    const off = bus.on('run.completed', () => { count++; });

    const event = createEvent('run.completed', 'runner', {
      runId: 'r', workflowId: 'w', status: 'succeeded', cancelled: false, durationMs: 1, succeeded: 1, failed: 0, skipped: 0,
    });
    await bus.emit(event);
    off();
    await bus.emit(event);

    expect(onceCount).toBe(1);
    expect(count).toBe(1);
    expect(bus.getStats()).toEqual({});
  });

  it('a throwing handler does not stop other handlers', async () => {
    const seen: string[] = [];
    const originalError = console.error;
    console.error = () => undefined;
    try {
      bus.on('run.node_started', () => { throw new Error('handler broke'); });
      bus.on('run.node_started', e => { seen.push(e.payload.nodeId); });
      await bus.emit(createEvent('run.node_started', 'runner', { runId: 'r', nodeId: 'n1', modelId: 'm', attempt: 1 }));
    } finally {
      console.error = originalError;
    }
    expect(seen).toEqual(['n1']);
  });

  it('keeps bounded history filterable by channel', async () => {
    const small = new EventBus({ maxHistory: 2 });
    const events: BusEvent[] = [
      createEvent('run.node_output', 'runner', { runId: 'r', nodeId: 'a', output: '1' }),
      createEvent('run.node_output', 'runner', { runId: 'r', nodeId: 'b', output: '2' }),
      createEvent('run.node_started', 'runner', { runId: 'r', nodeId: 'c', modelId: 'm', attempt: 1 }),
    ];
    for (const e of events) await small.emit(e);

    expect(small.getHistory()).toHaveLength(2);
    expect(small.getHistory('run.node_output')).toHaveLength(1);
    expect(small.getHistory('run.node_started')[0]?.channel).toBe('run.node_started');
  });

  it('createEvent scopes events to a run and workflow', () => {
    const event = createEvent('run.node_output', 'runner', { runId: 'r1', nodeId: 'a', output: '' }, { runId: 'r1', workflowId: 'w1' });
    expect(event.runId).toBe('r1');
    expect(event.workflowId).toBe('w1');
    expect(event.source).toBe('runner');
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
  });
});

// ─── RunStore ────────────────────────────────────────────────────

describe('RunStore', () => {
  let tempDir: string;
  let store: RunStore;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'docweave-store-'));
    store = new RunStore(join(tempDir, 'nested', 'runs.db'));
  });

  afterEach(() => {
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('saves workflows once and reads the descriptor back', () => {
    store.saveWorkflow(descriptor('wf_1'));
    store.saveWorkflow({ ...descriptor('wf_1'), query: 'changed' });

    expect(store.getWorkflow('wf_1')).toEqual(descriptor('wf_1'));
    expect(store.getWorkflow('wf_missing')).toBeNull();

    const [summary] = store.listWorkflows();
    expect(summary).toEqual({
      workflowId: 'wf_1',
      patternType: 'multi_document_compare',
      patternName: 'Comparative Analysis',
      profile: 'balanced',
      query: 'Compare these two reports',
      nodeCount: 3,
      createdAt: '2026-03-01T10:00:00.000Z',
    });
  });

  it('records a run and rebuilds the full report', () => {
    store.saveWorkflow(descriptor('wf_1'));
    const original = report('run_1', 'wf_1');
    store.recordRun(original);

    const loaded = store.getRun('run_1');
    expect(loaded).toEqual(original);
    expect(store.getNodeResults('run_1').map(n => n.nodeId)).toEqual(['extract_1', 'extract_2', 'compare']);
    expect(store.getRun('run_missing')).toBeNull();
  });

  it('rejects a run for an unknown workflow', () => {
    expect(() => store.recordRun(report('run_x', 'wf_unknown'))).toThrow();
  });

  it('lists runs newest first with status and workflow filters', () => {
    store.saveWorkflow(descriptor('wf_1'));
    store.saveWorkflow(descriptor('wf_2'));
    store.recordRun(report('run_a', 'wf_1', { startedAt: '2026-03-01T09:00:00.000Z', status: 'succeeded' }));
    store.recordRun(report('run_b', 'wf_1', { startedAt: '2026-03-01T11:00:00.000Z', status: 'failed' }));
    store.recordRun(report('run_c', 'wf_2', { startedAt: '2026-03-01T10:00:00.000Z', status: 'succeeded', cancelled: true }));

    expect(store.listRuns().map(r => r.runId)).toEqual(['run_b', 'run_c', 'run_a']);
    expect(store.listRuns({ status: 'succeeded' }).map(r => r.runId)).toEqual(['run_c', 'run_a']);
    expect(store.listRuns({ workflowId: 'wf_1', limit: 1 }).map(r => r.runId)).toEqual(['run_b']);

    const run = store.listRuns({ workflowId: 'wf_2' })[0];
    expect(run?.cancelled).toBe(true);
    expect(run?.patternName).toBe('Comparative Analysis');
    expect(run?.estimatedCostUsd).toBe(0.15);
  });

  it('counts runs by status and deletes runs', () => {
    store.saveWorkflow(descriptor('wf_1'));
    store.recordRun(report('run_a', 'wf_1', { status: 'succeeded' }));
    store.recordRun(report('run_b', 'wf_1', { status: 'partial' }));

    expect(store.getStats()).toEqual({ workflows: 1, runs: 2, byStatus: { succeeded: 1, partial: 1, failed: 0 } });

    expect(store.deleteRun('run_a')).toBe(true);
    expect(store.deleteRun('run_a')).toBe(false);
    expect(store.getNodeResults('run_a')).toEqual([]);
    expect(store.getStats().runs).toBe(1);
  });
});
