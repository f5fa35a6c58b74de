/**
 * docweave patterns — List the pattern catalog
 */

import { PATTERN_CATALOG } from '@docweave/planner';
import type { Pattern } from '@docweave/planner';
import { formatTable } from '../utils.js';

export interface PatternsResult {
  patterns: readonly Pattern[];
  report: string;
}

export function patterns(): PatternsResult {
  const rows = PATTERN_CATALOG.map(p => [
    p.type,
    p.name,
    String(p.complexityScore),
    `${p.costFactor}x`,
    p.streaming ? 'yes' : 'no',
    p.fileTypeHints.join(' '),
  ]);

  const details = PATTERN_CATALOG.map(p => [
    `  ${p.name}`,
    `    ${p.description}`,
    `    Keywords: ${p.intentKeywords.map(k => k.trim()).join(', ')}`,
    `    Steps:    ${p.template.map(t => (t.fanOut === 'per_file' ? `${t.key}×N` : t.key)).join(' → ')}`,
  ].join('\n'));

  const report = [
    '',
    '=== docweave Patterns ===',
    '',
    formatTable(['TYPE', 'NAME', 'COMPLEXITY', 'COST', 'STREAMING', 'FILE TYPES'], rows),
    '',
    ...details,
    '',
  ].join('\n');

  return { patterns: PATTERN_CATALOG, report };
}
