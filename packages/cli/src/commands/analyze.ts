/**
 * docweave analyze — Classify a query and preview its workflow
 *
 * Nothing is written and nothing runs: the query is classified, the
 * winning pattern is compiled against the profile and the plan is shown.
 */

import { compile, estimateWorkflowCost, scorePatterns, classify, criticalPath } from '@docweave/planner';
import type { Pattern, PatternMatch, WorkflowSpec } from '@docweave/planner';
import { loadConfig, resolveProfile } from '../config.js';
import type { DocweaveConfig } from '../config.js';
import { formatNode, formatUsd, formatWorkflowSummary } from '../utils.js';

export interface AnalyzeResult {
  ok: boolean;
  pattern: Pattern;
  matches: PatternMatch[];
  spec: WorkflowSpec | null;
  errors: string[];
  report: string;
}

export interface AnalyzeOptions {
  profile?: string;
  config?: DocweaveConfig;
}

export function analyze(query: string, files: readonly string[], opts?: AnalyzeOptions): AnalyzeResult {
  const config = opts?.config ?? loadConfig();
  const pattern = classify(query, files);
  const matches = scorePatterns(query, files);

  const scoreLines = matches.map(m => {
    const why = [...m.matchedKeywords.map(k => `"${k.trim()}"`), ...m.matchedExtensions].join(', ');
    return `    ${String(m.score).padStart(2)}  ${m.pattern.name}${why ? `  (${why})` : ''}`;
  });

  const header = [
    '',
    '=== docweave Query Analysis ===',
    '',
    `  Query:  ${query}`,
    `  Files:  ${files.length > 0 ? files.join(', ') : '(none)'}`,
    '',
    '  Pattern scores:',
    ...scoreLines,
    '',
  ];

  const profileResult = resolveProfile(opts?.profile ?? config.defaultProfile);
  if (!profileResult.ok) {
    return {
      ok: false, pattern, matches, spec: null, errors: profileResult.errors,
      report: [...header, ...profileResult.errors.map(e => `  Error: ${e}`), ''].join('\n'),
    };
  }

  const result = compile(pattern, query, files, profileResult.profile);
  if (!result.ok) {
    const errors = result.errors.map(e => `${e.code}: ${e.message}`);
    return {
      ok: false, pattern, matches, spec: null, errors,
      report: [...header, `  Selected: ${pattern.name}`, ...errors.map(e => `  Error: ${e}`), ''].join('\n'),
    };
  }

  const spec = result.spec;
  const cost = estimateWorkflowCost(spec, config.baseUnitCostUsd);
  const path = criticalPath(spec.nodes);

  const report = [
    ...header,
    ...formatWorkflowSummary(spec),
    `  Critical path:   ${path.nodeIds.join(' → ')}`,
    `  Estimated cost:  ${formatUsd(cost.patternCostUsd)} (pattern), ${formatUsd(cost.nodeCostUsd)} (per node)`,
    '',
    '  DAG:',
    ...spec.nodes.map(n => `    ${formatNode(n)}`),
    '',
  ].join('\n');

  return { ok: true, pattern, matches, spec, errors: [], report };
}
