/**
 * Cost Estimator — USD estimates for a compiled workflow
 *
 * Two views of the same workflow:
 * - pattern cost: the pattern's relative cost factor × the baseline unit cost
 * - node cost:    Σ per-node cost units × the baseline unit cost
 *
 * The first is what the pattern table quotes, the second follows the
 * actual fan-out and profile.
 */

import type { PatternType } from '@docweave/shared';
import { PATTERN_CATALOG } from './pattern-catalog.js';
import { compile } from './dag-compiler.js';
import type { DagNode, OptimizationProfile, WorkflowSpec } from './types.js';

export const DEFAULT_BASE_UNIT_COST_USD = 1.5;

export interface NodeCost {
  nodeId: string;
  modelId: string;
  costUsd: number;
}

export interface WorkflowCostEstimate {
  baseUnitCostUsd: number;
  patternCostUsd: number;
  nodeCostUsd: number;
  perNode: NodeCost[];
}

export function estimateWorkflowCost(
  spec: WorkflowSpec,
  baseUnitCostUsd: number = DEFAULT_BASE_UNIT_COST_USD
): WorkflowCostEstimate {
  const perNode = spec.nodes.map(node => ({
    nodeId: node.nodeId,
    modelId: node.modelId,
    costUsd: nodeCostUsd(node, baseUnitCostUsd),
  }));

  return {
    baseUnitCostUsd,
    patternCostUsd: roundUsd(spec.pattern.costFactor * baseUnitCostUsd),
    nodeCostUsd: roundUsd(perNode.reduce((sum, n) => sum + n.costUsd, 0)),
    perNode,
  };
}

export function nodeCostUsd(node: DagNode, baseUnitCostUsd: number = DEFAULT_BASE_UNIT_COST_USD): number {
  return roundUsd(node.estimatedCostUnits * baseUnitCostUsd);
}

export function roundUsd(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

// ─── Pattern × Profile Table ─────────────────────────────────────

export interface CostTableRow {
  patternType: PatternType;
  patternName: string;
  profileName: string;
  nodeCount: number;
  patternCostUsd: number;
  nodeCostUsd: number;
  estimatedSeconds: number;
}

/**
 * Compile every catalog pattern under every given profile for a
 * representative file count and quote the estimates side by side.
 * Pattern/profile pairs that fail to compile are left out.
 */
export function buildCostTable(
  profiles: readonly OptimizationProfile[],
  fileCount = 3,
  baseUnitCostUsd: number = DEFAULT_BASE_UNIT_COST_USD
): CostTableRow[] {
  const files = Array.from({ length: fileCount }, (_, i) => `document_${i + 1}.pdf`);
  const rows: CostTableRow[] = [];

  for (const pattern of PATTERN_CATALOG) {
    for (const profile of profiles) {
      const result = compile(pattern, 'cost estimate', files, profile, { workflowId: 'cost_table' });
      if (!result.ok) continue;

      const estimate = estimateWorkflowCost(result.spec, baseUnitCostUsd);
      rows.push({
        patternType: pattern.type,
        patternName: pattern.name,
        profileName: profile.name,
        nodeCount: result.spec.nodes.length,
        patternCostUsd: estimate.patternCostUsd,
        nodeCostUsd: estimate.nodeCostUsd,
        estimatedSeconds: result.spec.executionPlan.totalEstimatedTimeSeconds,
      });
    }
  }

  return rows;
}
