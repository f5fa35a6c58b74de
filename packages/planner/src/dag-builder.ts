/**
 * DAG Builder — Construction-time graph invariants and plan metrics
 *
 * A node may only depend on nodes declared before it, so a graph that
 * passes validation is acyclic by construction. Members of one parallel
 * group must not reach each other through dependency edges.
 */

import type { DagNode, ValidationResult } from './types.js';

export type BuildResult =
  | { ok: true; nodes: readonly DagNode[] }
  | { ok: false; errors: string[] };

export class DagBuilder {
  private nodes: DagNode[] = [];

  add(node: DagNode): this {
    this.nodes.push(Object.freeze({ ...node, inputFrom: Object.freeze([...node.inputFrom]) }));
    return this;
  }

  build(): BuildResult {
    const validation = validateDag(this.nodes);
    if (!validation.valid) {
      return { ok: false, errors: validation.errors };
    }
    return { ok: true, nodes: Object.freeze([...this.nodes]) };
  }
}

/**
 * Check every structural invariant of a node list in creation order.
 */
export function validateDag(nodes: readonly DagNode[]): ValidationResult {
  const errors: string[] = [];
  const declared = new Set<string>();

  for (const node of nodes) {
    if (node.nodeId === '') {
      errors.push('Node id must be non-empty');
    }
    if (declared.has(node.nodeId)) {
      errors.push(`Duplicate node id "${node.nodeId}"`);
    }

    const seenInputs = new Set<string>();
    for (const dep of node.inputFrom) {
      if (dep === node.nodeId) {
        errors.push(`Node "${node.nodeId}" depends on itself`);
      } else if (!declared.has(dep)) {
        errors.push(`Node "${node.nodeId}" depends on "${dep}", which is not declared before it`);
      }
      if (seenInputs.has(dep)) {
        errors.push(`Node "${node.nodeId}" lists "${dep}" more than once`);
      }
      seenInputs.add(dep);
    }

    declared.add(node.nodeId);
  }

  if (errors.length === 0) {
    errors.push(...validateParallelGroups(nodes));
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Members of a parallel group must have no dependency path between them.
 * Assumes references are already valid.
 */
export function validateParallelGroups(nodes: readonly DagNode[]): string[] {
  const ancestors = computeAncestors(nodes);
  const errors: string[] = [];

  for (const [group, members] of groupMembers(nodes)) {
    for (const a of members) {
      for (const b of members) {
        if (a !== b && ancestors.get(b)?.has(a)) {
          errors.push(`Parallel group "${group}": "${b}" depends on "${a}"`);
        }
      }
    }
  }

  return errors;
}

// ─── Plan Metrics ────────────────────────────────────────────────

export interface CriticalPath {
  seconds: number;
  nodeIds: string[];
}

/**
 * Longest latency-weighted chain from any root to any leaf.
 * Independent nodes run concurrently, so this, not the sum over all
 * nodes, is the duration estimate.
 */
export function criticalPath(nodes: readonly DagNode[]): CriticalPath {
  const finish = new Map<string, number>();
  const via = new Map<string, string | null>();

  let endNode: string | null = null;
  let endTime = 0;

  for (const node of nodes) {
    let start = 0;
    let prev: string | null = null;
    for (const dep of node.inputFrom) {
      const depFinish = finish.get(dep) ?? 0;
      if (depFinish > start) {
        start = depFinish;
        prev = dep;
      }
    }
    const done = start + node.estimatedLatencySeconds;
    finish.set(node.nodeId, done);
    via.set(node.nodeId, prev);

    if (endNode === null || done > endTime) {
      endNode = node.nodeId;
      endTime = done;
    }
  }

  const nodeIds: string[] = [];
  let cursor = endNode;
  while (cursor !== null) {
    nodeIds.unshift(cursor);
    cursor = via.get(cursor) ?? null;
  }

  return { seconds: roundSeconds(endTime), nodeIds };
}

/**
 * Size of the largest parallel group; an ungrouped node counts as 1.
 */
export function widestParallelGroup(nodes: readonly DagNode[]): number {
  let widest = nodes.length > 0 ? 1 : 0;
  for (const members of groupMembers(nodes).values()) {
    widest = Math.max(widest, members.length);
  }
  return widest;
}

/**
 * Nodes no other node depends on, in creation order.
 */
export function leafNodes(nodes: readonly DagNode[]): DagNode[] {
  const referenced = new Set<string>();
  for (const node of nodes) {
    for (const dep of node.inputFrom) referenced.add(dep);
  }
  return nodes.filter(n => !referenced.has(n.nodeId));
}

/**
 * Node id → ids of nodes that list it in inputFrom.
 */
export function dependentsOf(nodes: readonly DagNode[]): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const node of nodes) dependents.set(node.nodeId, []);
  for (const node of nodes) {
    for (const dep of node.inputFrom) {
      dependents.get(dep)?.push(node.nodeId);
    }
  }
  return dependents;
}

function computeAncestors(nodes: readonly DagNode[]): Map<string, Set<string>> {
  const ancestors = new Map<string, Set<string>>();
  for (const node of nodes) {
    const set = new Set<string>();
    for (const dep of node.inputFrom) {
      set.add(dep);
      for (const a of ancestors.get(dep) ?? []) set.add(a);
    }
    ancestors.set(node.nodeId, set);
  }
  return ancestors;
}

function groupMembers(nodes: readonly DagNode[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const node of nodes) {
    if (!node.parallelGroup) continue;
    const members = groups.get(node.parallelGroup) ?? [];
    members.push(node.nodeId);
    groups.set(node.parallelGroup, members);
  }
  return groups;
}

function roundSeconds(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}
