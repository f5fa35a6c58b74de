/**
 * CLI formatting helpers
 */

import type { DagNode, WorkflowSpec } from '@docweave/planner';

export function formatUsd(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function formatSeconds(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round((seconds - minutes * 60) * 10) / 10;
  return rest === 0 ? `${minutes}m` : `${minutes}m ${rest}s`;
}

/**
 * Fixed-width text table. Every column is as wide as its widest cell.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));
  const line = (cells: readonly string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [
    line(headers),
    widths.map(w => '─'.repeat(w)).join('  '),
    ...rows.map(line),
  ].join('\n');
}

export function formatNode(node: DagNode): string {
  const deps = node.inputFrom.length > 0 ? ` ← ${node.inputFrom.join(', ')}` : '';
  const group = node.parallelGroup ? ` [${node.parallelGroup}]` : '';
  return `${node.nodeId} (${node.operation}, ${node.modelId})${group}${deps}`;
}

export function formatWorkflowSummary(spec: WorkflowSpec): string[] {
  return [
    `  Workflow:        ${spec.workflowId}`,
    `  Pattern:         ${spec.pattern.name} (${spec.pattern.type})`,
    `  Complexity:      ${spec.pattern.complexityScore}/10`,
    `  Profile:         ${spec.profileName}`,
    `  Nodes:           ${spec.nodes.length}`,
    `  Max parallel:    ${spec.executionPlan.maxParallelNodes}`,
    `  Estimated time:  ${formatSeconds(spec.executionPlan.totalEstimatedTimeSeconds)}`,
    `  Streaming:       ${spec.executionPlan.enableStreaming ? 'yes' : 'no'}`,
  ];
}

export function indent(text: string, spaces = 2): string {
  const pad = ' '.repeat(spaces);
  return text.split('\n').map(line => (line ? pad + line : line)).join('\n');
}
