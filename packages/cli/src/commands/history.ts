/**
 * docweave history — Recent runs from the run store
 */

import { RunStore } from '@docweave/shared';
import type { RunStatus, RunSummary } from '@docweave/shared';
import { loadConfig } from '../config.js';
import type { DocweaveConfig } from '../config.js';
import { formatTable, formatUsd } from '../utils.js';

export interface HistoryResult {
  runs: RunSummary[];
  report: string;
}

export interface HistoryOptions {
  limit?: number;
  status?: RunStatus;
  config?: DocweaveConfig;
}

export function history(opts?: HistoryOptions): HistoryResult {
  const config = opts?.config ?? loadConfig();
  const store = new RunStore(config.dbPath);

  let runs: RunSummary[];
  try {
    runs = store.listRuns({ limit: opts?.limit ?? 20, status: opts?.status });
  } finally {
    store.close();
  }

  if (runs.length === 0) {
    return { runs, report: 'No runs found.' };
  }

  const report = [
    '',
    `=== docweave Runs (${runs.length}) ===`,
    '',
    formatTable(
      ['RUN ID', 'PATTERN', 'STATUS', 'DURATION', 'COST', 'STARTED'],
      runs.map(r => [
        r.runId,
        r.patternName,
        r.cancelled ? `${r.status} (cancelled)` : r.status,
        `${r.durationMs}ms`,
        formatUsd(r.estimatedCostUsd),
        r.startedAt.slice(0, 19),
      ])
    ),
    '',
  ].join('\n');

  return { runs, report };
}
