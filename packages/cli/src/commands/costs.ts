/**
 * docweave costs — Estimated cost and duration per pattern × profile
 */

import { buildCostTable, listProfiles } from '@docweave/planner';
import type { CostTableRow } from '@docweave/planner';
import { loadConfig } from '../config.js';
import type { DocweaveConfig } from '../config.js';
import { formatSeconds, formatTable, formatUsd } from '../utils.js';

export interface CostsResult {
  rows: CostTableRow[];
  fileCount: number;
  baseUnitCostUsd: number;
  report: string;
}

export interface CostsOptions {
  fileCount?: number;
  config?: DocweaveConfig;
}

export function costs(opts?: CostsOptions): CostsResult {
  const config = opts?.config ?? loadConfig();
  const fileCount = opts?.fileCount ?? 3;
  const rows = buildCostTable(listProfiles(), fileCount, config.baseUnitCostUsd);

  const report = [
    '',
    '=== docweave Cost Estimates ===',
    '',
    `  ${fileCount} input file${fileCount === 1 ? '' : 's'}, ${formatUsd(config.baseUnitCostUsd)} per cost unit`,
    '',
    formatTable(
      ['PATTERN', 'PROFILE', 'NODES', 'PATTERN COST', 'NODE COST', 'EST. TIME'],
      rows.map(r => [
        r.patternName,
        r.profileName,
        String(r.nodeCount),
        formatUsd(r.patternCostUsd),
        formatUsd(r.nodeCostUsd),
        formatSeconds(r.estimatedSeconds),
      ])
    ),
    '',
  ].join('\n');

  return { rows, fileCount, baseUnitCostUsd: config.baseUnitCostUsd, report };
}
