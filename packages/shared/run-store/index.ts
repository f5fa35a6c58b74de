/**
 * Run Store — Workflow and execution history
 *
 * SQLite via better-sqlite3 (synchronous, fast, zero-ops).
 *
 * This is the sink side of the core: the runner hands finished
 * ExecutionReports to it, the CLI and dashboard read them back.
 * The scheduler itself never reads from here.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type {
  WorkflowDescriptor,
  ExecutionReport,
  NodeResult,
  NodeError,
  NodeStatus,
  PatternType,
  RunStatus,
  RunMetrics,
  RunLogEntry,
} from '../types/index.js';

export interface WorkflowSummary {
  workflowId: string;
  patternType: PatternType;
  patternName: string;
  profile: string;
  query: string;
  nodeCount: number;
  createdAt: string;
}

export interface RunSummary {
  runId: string;
  workflowId: string;
  patternName: string;
  status: RunStatus;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  estimatedCostUsd: number;
}

export interface RunListOptions {
  limit?: number;
  status?: RunStatus;
  workflowId?: string;
}

export interface RunStoreStats {
  workflows: number;
  runs: number;
  byStatus: Record<RunStatus, number>;
}

// ─── Row Shapes ──────────────────────────────────────────────────

interface WorkflowRow {
  workflow_id: string;
  pattern_type: PatternType;
  pattern_name: string;
  profile: string;
  query: string;
  node_count: number;
  descriptor_json: string;
  created_at: string;
}

interface RunRow {
  run_id: string;
  workflow_id: string;
  pattern_name: string;
  status: RunStatus;
  cancelled: number;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  final_output: string | null;
  metrics_json: string;
  log_json: string;
}

interface NodeResultRow {
  run_id: string;
  node_id: string;
  position: number;
  status: NodeStatus;
  output: string;
  error_kind: NodeError['kind'] | null;
  error_message: string | null;
  attempts: number;
  started_at: string | null;
  finished_at: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS workflows (
    workflow_id     TEXT PRIMARY KEY,
    pattern_type    TEXT NOT NULL,
    pattern_name    TEXT NOT NULL,
    profile         TEXT NOT NULL,
    query           TEXT NOT NULL,
    node_count      INTEGER NOT NULL,
    descriptor_json TEXT NOT NULL,
    created_at      TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS runs (
    run_id       TEXT PRIMARY KEY,
    workflow_id  TEXT NOT NULL REFERENCES workflows(workflow_id),
    status       TEXT NOT NULL,
    cancelled    INTEGER NOT NULL DEFAULT 0,
    started_at   TEXT NOT NULL,
    finished_at  TEXT NOT NULL,
    duration_ms  INTEGER NOT NULL,
    final_output TEXT,
    metrics_json TEXT NOT NULL,
    log_json     TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS node_results (
    run_id        TEXT NOT NULL REFERENCES runs(run_id),
    node_id       TEXT NOT NULL,
    position      INTEGER NOT NULL,
    status        TEXT NOT NULL,
    output        TEXT NOT NULL,
    error_kind    TEXT,
    error_message TEXT,
    attempts      INTEGER NOT NULL,
    started_at    TEXT,
    finished_at   TEXT,
    PRIMARY KEY (run_id, node_id)
  );

  CREATE INDEX IF NOT EXISTS idx_runs_workflow ON runs(workflow_id);
  CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
`;

export class RunStore {
  private db: Database.Database;

  constructor(dbPath = ':memory:') {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
  }

  // ─── Workflows ─────────────────────────────────────────────────

  /**
   * Save a compiled workflow. Saving the same workflow twice is a no-op.
   */
  saveWorkflow(descriptor: WorkflowDescriptor): void {
    this.db.prepare(`
      INSERT OR IGNORE INTO workflows
        (workflow_id, pattern_type, pattern_name, profile, query, node_count, descriptor_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      descriptor.workflow_id,
      descriptor.pattern_type,
      descriptor.pattern_name,
      descriptor.profile,
      descriptor.query,
      descriptor.dag_nodes.length,
      JSON.stringify(descriptor),
      descriptor.created_at
    );
  }

  getWorkflow(workflowId: string): WorkflowDescriptor | null {
    const row = this.db
      .prepare<[string], WorkflowRow>('SELECT * FROM workflows WHERE workflow_id = ?')
      .get(workflowId);
    if (!row) return null;
    const descriptor: WorkflowDescriptor = JSON.parse(row.descriptor_json);
    return descriptor;
  }

  /**
   * List workflows, newest first.
   */
  listWorkflows(limit = 50): WorkflowSummary[] {
    const rows = this.db
      .prepare<[number], WorkflowRow>('SELECT * FROM workflows ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(limit);
    return rows.map(mapWorkflowRow);
  }

  // ─── Runs ──────────────────────────────────────────────────────

  /**
   * Record a finished run and all of its node results in one transaction.
   * The workflow must have been saved first.
   */
  recordRun(report: ExecutionReport): void {
    const insertRun = this.db.prepare(`
      INSERT INTO runs
        (run_id, workflow_id, status, cancelled, started_at, finished_at, duration_ms, final_output, metrics_json, log_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertNode = this.db.prepare(`
      INSERT INTO node_results
        (run_id, node_id, position, status, output, error_kind, error_message, attempts, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const tx = this.db.transaction((r: ExecutionReport) => {
      insertRun.run(
        r.runId,
        r.workflowId,
        r.status,
        r.cancelled ? 1 : 0,
        r.startedAt,
        r.finishedAt,
        r.durationMs,
        r.finalOutput,
        JSON.stringify(r.metrics),
        JSON.stringify(r.log)
      );
      r.nodes.forEach((node, position) => {
        insertNode.run(
          r.runId,
          node.nodeId,
          position,
          node.status,
          node.output,
          node.error?.kind ?? null,
          node.error?.message ?? null,
          node.attempts,
          node.startedAt,
          node.finishedAt
        );
      });
    });

    tx(report);
  }

  /**
   * Rebuild the full report for a recorded run.
   */
  getRun(runId: string): ExecutionReport | null {
    const row = this.db
      .prepare<[string], RunRow>(`
        SELECT runs.*, workflows.pattern_name FROM runs
        JOIN workflows ON workflows.workflow_id = runs.workflow_id
        WHERE run_id = ?
      `)
      .get(runId);
    if (!row) return null;

    const nodes = this.getNodeResults(runId);
    const outputs: Record<string, string> = {};
    for (const node of nodes) {
      if (node.status === 'succeeded') outputs[node.nodeId] = node.output;
    }
    const metrics: RunMetrics = JSON.parse(row.metrics_json);
    const log: RunLogEntry[] = JSON.parse(row.log_json);

    return {
      runId: row.run_id,
      workflowId: row.workflow_id,
      status: row.status,
      cancelled: row.cancelled === 1,
      nodes,
      outputs,
      finalOutput: row.final_output,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      durationMs: row.duration_ms,
      metrics,
      log,
    };
  }

  getNodeResults(runId: string): NodeResult[] {
    const rows = this.db
      .prepare<[string], NodeResultRow>('SELECT * FROM node_results WHERE run_id = ? ORDER BY position')
      .all(runId);
    return rows.map(mapNodeRow);
  }

  /**
   * List runs, newest first, optionally filtered by status or workflow.
   */
  listRuns(opts?: RunListOptions): RunSummary[] {
    const clauses: string[] = [];
    const params: (string | number)[] = [];

    if (opts?.status) {
      clauses.push('runs.status = ?');
      params.push(opts.status);
    }
    if (opts?.workflowId) {
      clauses.push('runs.workflow_id = ?');
      params.push(opts.workflowId);
    }
    params.push(opts?.limit ?? 20);

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare<(string | number)[], RunRow>(`
        SELECT runs.*, workflows.pattern_name FROM runs
        JOIN workflows ON workflows.workflow_id = runs.workflow_id
        ${where}
        ORDER BY runs.started_at DESC, runs.rowid DESC
        LIMIT ?
      `)
      .all(...params);

    return rows.map(mapRunRow);
  }

  /**
   * Delete a run and its node results.
   */
  deleteRun(runId: string): boolean {
    this.db.prepare('DELETE FROM node_results WHERE run_id = ?').run(runId);
    const result = this.db.prepare('DELETE FROM runs WHERE run_id = ?').run(runId);
    return result.changes > 0;
  }

  getStats(): RunStoreStats {
    const workflows = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM workflows')
      .get()?.count ?? 0;
    const statusRows = this.db
      .prepare<[], { status: RunStatus; count: number }>('SELECT status, COUNT(*) AS count FROM runs GROUP BY status')
      .all();

    const byStatus: Record<RunStatus, number> = { succeeded: 0, partial: 0, failed: 0 };
    let runs = 0;
    for (const row of statusRows) {
      byStatus[row.status] = row.count;
      runs += row.count;
    }

    return { workflows, runs, byStatus };
  }

  close(): void {
    this.db.close();
  }
}

// ─── Row Mappers ─────────────────────────────────────────────────

function mapWorkflowRow(row: WorkflowRow): WorkflowSummary {
  return {
    workflowId: row.workflow_id,
    patternType: row.pattern_type,
    patternName: row.pattern_name,
    profile: row.profile,
    query: row.query,
    nodeCount: row.node_count,
    createdAt: row.created_at,
  };
}

function mapRunRow(row: RunRow): RunSummary {
  const metrics: RunMetrics = JSON.parse(row.metrics_json);
  return {
    runId: row.run_id,
    workflowId: row.workflow_id,
    patternName: row.pattern_name,
    status: row.status,
    cancelled: row.cancelled === 1,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationMs: row.duration_ms,
    estimatedCostUsd: metrics.estimatedCostUsd,
  };
}

function mapNodeRow(row: NodeResultRow): NodeResult {
  const result: NodeResult = {
    nodeId: row.node_id,
    status: row.status,
    output: row.output,
    attempts: row.attempts,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
  if (row.error_kind !== null) {
    result.error = { kind: row.error_kind, message: row.error_message ?? '' };
  }
  return result;
}
