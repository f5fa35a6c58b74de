/**
 * docweave results — Show a recorded run
 *
 * Formats: text (default), markdown, json.
 */

import { RunStore } from '@docweave/shared';
import type { ExecutionReport } from '@docweave/shared';
import { loadConfig } from '../config.js';
import type { DocweaveConfig } from '../config.js';
import { formatUsd, indent } from '../utils.js';

export type ResultFormat = 'json' | 'text' | 'markdown';

export const RESULT_FORMATS: readonly ResultFormat[] = ['json', 'text', 'markdown'];

export function isResultFormat(value: unknown): value is ResultFormat {
  return typeof value === 'string' && RESULT_FORMATS.some(f => f === value);
}

export interface ResultsResult {
  found: boolean;
  execution: ExecutionReport | null;
  report: string;
}

export interface ResultsOptions {
  format?: ResultFormat;
  config?: DocweaveConfig;
}

export function results(runId: string, opts?: ResultsOptions): ResultsResult {
  const config = opts?.config ?? loadConfig();
  const store = new RunStore(config.dbPath);
  try {
    const execution = store.getRun(runId);
    if (!execution) {
      return { found: false, execution: null, report: `Run ${runId} not found in ${config.dbPath}.` };
    }
    return { found: true, execution, report: formatExecution(execution, opts?.format ?? 'text') };
  } finally {
    store.close();
  }
}

export function formatExecution(execution: ExecutionReport, format: ResultFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(execution, null, 2);
    case 'markdown':
      return formatMarkdown(execution);
    case 'text':
      return formatText(execution);
  }
}

function formatText(r: ExecutionReport): string {
  const lines = [
    '',
    '=== docweave Run ===',
    '',
    `  Run:         ${r.runId}`,
    `  Workflow:    ${r.workflowId}`,
    `  Status:      ${r.status}${r.cancelled ? ' (cancelled)' : ''}`,
    `  Duration:    ${r.durationMs}ms`,
    `  Invocations: ${r.metrics.invocations} (${r.metrics.retries} retries, peak ${r.metrics.peakConcurrency} parallel)`,
    `  Est. cost:   ${formatUsd(r.metrics.estimatedCostUsd)}`,
    '',
    '  Nodes:',
    ...r.nodes.map(n => {
      const error = n.error ? ` — ${n.error.kind}: ${n.error.message}` : '';
      return `    ${n.status.padEnd(9)} ${n.nodeId} (${n.attempts} attempt${n.attempts === 1 ? '' : 's'})${error}`;
    }),
    '',
  ];

  if (r.finalOutput !== null) {
    lines.push('  Final output:', indent(r.finalOutput, 4), '');
  }
  return lines.join('\n');
}

function formatMarkdown(r: ExecutionReport): string {
  const lines = [
    `# Run ${r.runId}`,
    '',
    `- **Workflow:** ${r.workflowId}`,
    `- **Status:** ${r.status}${r.cancelled ? ' (cancelled)' : ''}`,
    `- **Duration:** ${r.durationMs}ms`,
    `- **Estimated cost:** ${formatUsd(r.metrics.estimatedCostUsd)}`,
    '',
    '| Node | Status | Attempts | Error |',
    '| --- | --- | --- | --- |',
    ...r.nodes.map(n => `| ${n.nodeId} | ${n.status} | ${n.attempts} | ${n.error ? `${n.error.kind}: ${n.error.message}` : ''} |`),
    '',
  ];

  if (r.finalOutput !== null) {
    lines.push('## Final output', '', r.finalOutput, '');
  }
  return lines.join('\n');
}
