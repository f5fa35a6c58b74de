/**
 * Planner Test Suite
 *
 * 1. Pattern Catalog & Classifier — scoring, tie-breaks, fallback
 * 2. DAG Builder — reference validity, parallel-group independence, metrics
 * 3. DAG Compiler — fan-out, wiring, instructions, plan, failures
 * 4. Profiles — built-ins and YAML custom profiles
 * 5. Serialization & Cost — descriptor round trip, estimates
 */

import { describe, it, expect } from 'vitest';
import {
  PATTERN_CATALOG,
  classify,
  scorePattern,
  scorePatterns,
  getPattern,
  getProfile,
  listProfiles,
  withMaxParallel,
  parseProfile,
  compile,
  createWorkflowFromQuery,
  generateWorkflowId,
  renderInstruction,
  DagBuilder,
  validateDag,
  criticalPath,
  widestParallelGroup,
  leafNodes,
  toWorkflowDescriptor,
  parseWorkflowDescriptor,
  estimateWorkflowCost,
  buildCostTable,
  MODELS,
  MAX_TIMEOUT_MS,
} from '@docweave/planner';
import type { DagNode, OptimizationProfile, WorkflowSpec } from '@docweave/planner';

// ─── Helpers ─────────────────────────────────────────────────────

const NOW = new Date('2026-03-01T10:20:30.000Z');

function node(nodeId: string, inputFrom: string[] = [], extra: Partial<DagNode> = {}): DagNode {
  return {
    nodeId,
    operation: 'extract',
    modelId: 'model-small',
    instruction: `run ${nodeId}`,
    inputFrom,
    parallelGroup: null,
    timeoutMs: 1000,
    estimatedLatencySeconds: 1,
    estimatedCostUnits: 0,
    ...extra,
  };
}

function compileOk(query: string, files: string[], profile: OptimizationProfile = getProfile('balanced')): WorkflowSpec {
  const result = createWorkflowFromQuery(query, files, profile, { workflowId: 'wf_test', now: NOW });
  if (!result.ok) {
    throw new Error(result.errors.map(e => e.message).join('; '));
  }
  return result.spec;
}

/** Deterministic PRNG (mulberry32). */
function prng(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomDag(random: () => number, size: number): DagNode[] {
  const nodes: DagNode[] = [];
  for (let i = 0; i < size; i++) {
    const inputFrom = nodes.filter(() => random() < 0.3).map(n => n.nodeId);
    nodes.push(node(`n${i}`, inputFrom, { estimatedLatencySeconds: 1 + Math.floor(random() * 20) }));
  }
  return nodes;
}

// ─── Pattern Catalog & Classifier ────────────────────────────────

describe('Pattern classifier', () => {
  it('catalog lists every pattern once in declaration order', () => {
    expect(PATTERN_CATALOG.map(p => p.type)).toEqual([
      'simple_qa',
      'multi_document_compare',
      'research_synthesis',
      'fact_checking',
      'summarize_then_extract',
      'iterative_refine',
    ]);
  });

  it('scores keywords at 2 and distinct file extensions at 1', () => {
    const match = scorePattern(getPattern('multi_document_compare'), 'Compare these two reports', ['a.pdf', 'b.PDF', 'c.pdf']);
    expect(match.matchedKeywords).toEqual(['compare']);
    expect(match.matchedExtensions).toEqual(['.pdf']);
    expect(match.score).toBe(3);
  });

  it('routes comparison queries to Comparative Analysis', () => {
    expect(classify('Compare these two reports', ['a.pdf', 'b.pdf']).type).toBe('multi_document_compare');
  });

  it('routes synthesis queries to Research Synthesis', () => {
    expect(classify('Extract data from multiple sources and synthesize', []).type).toBe('research_synthesis');
  });

  it('routes verification queries to Fact Checking', () => {
    expect(classify('Verify claims against multiple documents', []).type).toBe('fact_checking');
  });

  it('routes direct questions to Simple Q&A', () => {
    expect(classify('What is the company policy?', []).type).toBe('simple_qa');
  });

  it('falls back to Simple Q&A when nothing matches', () => {
    const best = scorePatterns('hello', [])[0];
    expect(best?.score).toBe(0);
    expect(classify('hello', []).type).toBe('simple_qa');
  });

  it('breaks score ties by lower complexity', () => {
    // .csv → Comparative Analysis (6), .pptx → Summarize Then Extract (4)
    expect(classify('', ['data.csv', 'deck.pptx']).type).toBe('summarize_then_extract');
  });

  it('is deterministic', () => {
    const inputs: [string, string[]][] = [
      ['Compare these two reports', ['a.pdf', 'b.pdf']],
      ['Summarize the key points and verify the claims', ['x.txt']],
      ['Refine this draft', ['notes.md']],
    ];
    for (const [query, files] of inputs) {
      const first = scorePatterns(query, files).map(m => `${m.pattern.type}:${m.score}`);
      for (let i = 0; i < 5; i++) {
        expect(scorePatterns(query, files).map(m => `${m.pattern.type}:${m.score}`)).toEqual(first);
      }
    }
  });
});

// ─── DAG Builder ─────────────────────────────────────────────────

describe('DAG builder', () => {
  it('accepts nodes that only reference earlier nodes', () => {
    const result = new DagBuilder().add(node('a')).add(node('b', ['a'])).add(node('c', ['a', 'b'])).build();
    expect(result.ok).toBe(true);
  });

  it('rejects forward references, self references and duplicates', () => {
    expect(validateDag([node('a', ['b']), node('b')]).errors).toEqual([
      'Node "a" depends on "b", which is not declared before it',
    ]);
    expect(validateDag([node('a', ['a'])]).errors).toEqual(['Node "a" depends on itself']);
    expect(validateDag([node('a'), node('a')]).errors).toEqual(['Duplicate node id "a"']);
  });

  it('rejects cycles, which can only appear as forward references', () => {
    const result = validateDag([node('a', ['c']), node('b', ['a']), node('c', ['b'])]);
    expect(result.valid).toBe(false);
  });

  it('rejects a dependency path between members of one parallel group', () => {
    const result = new DagBuilder()
      .add(node('a', [], { parallelGroup: 'g' }))
      .add(node('mid', ['a']))
      .add(node('b', ['mid'], { parallelGroup: 'g' }))
      .build();
    expect(result).toEqual({ ok: false, errors: ['Parallel group "g": "b" depends on "a"'] });
  });

  it('freezes built nodes', () => {
    const result = new DagBuilder().add(node('a')).build();
    if (!result.ok) throw new Error('expected a valid DAG');
    expect(Object.isFrozen(result.nodes)).toBe(true);
    expect(Object.isFrozen(result.nodes[0])).toBe(true);
  });

  it('measures the critical path, widest group and leaves', () => {
    const nodes = [
      node('x1', [], { parallelGroup: 'x', estimatedLatencySeconds: 8 }),
      node('x2', [], { parallelGroup: 'x', estimatedLatencySeconds: 5 }),
      node('x3', [], { parallelGroup: 'x', estimatedLatencySeconds: 2 }),
      node('join', ['x1', 'x2', 'x3'], { estimatedLatencySeconds: 10 }),
      node('side', ['x3'], { estimatedLatencySeconds: 30 }),
    ];
    expect(criticalPath(nodes)).toEqual({ seconds: 32, nodeIds: ['x3', 'side'] });
    expect(widestParallelGroup(nodes)).toBe(3);
    expect(leafNodes(nodes).map(n => n.nodeId)).toEqual(['join', 'side']);
    expect(widestParallelGroup([node('solo')])).toBe(1);
  });

  it('randomized DAGs are valid and the critical path never shrinks when a latency grows', () => {
    const random = prng(20260301);
    for (let round = 0; round < 50; round++) {
      const nodes = randomDag(random, 2 + Math.floor(random() * 15));
      expect(validateDag(nodes).valid).toBe(true);

      const before = criticalPath(nodes).seconds;
      const target = Math.floor(random() * nodes.length);
      const bumped = nodes.map((n, i) =>
        i === target ? { ...n, estimatedLatencySeconds: n.estimatedLatencySeconds + 1 + Math.floor(random() * 10) } : n
      );
      expect(criticalPath(bumped).seconds).toBeGreaterThanOrEqual(before);

      const maxSingle = Math.max(...nodes.map(n => n.estimatedLatencySeconds));
      const sum = nodes.reduce((s, n) => s + n.estimatedLatencySeconds, 0);
      expect(before).toBeGreaterThanOrEqual(maxSingle);
      expect(before).toBeLessThanOrEqual(sum);
    }
  });
});

// ─── DAG Compiler ────────────────────────────────────────────────

describe('DAG compiler', () => {
  it('compiles the comparison scenario on the balanced profile', () => {
    const spec = compileOk('Compare these two reports', ['a.pdf', 'b.pdf']);

    expect(spec.pattern.type).toBe('multi_document_compare');
    expect(spec.nodes.map(n => [n.nodeId, n.operation, n.modelId, n.inputFrom, n.parallelGroup])).toEqual([
      ['extract_1', 'extract', MODELS.haiku, [], 'extract_group'],
      ['extract_2', 'extract', MODELS.haiku, [], 'extract_group'],
      ['compare', 'compare', MODELS.sonnet, ['extract_1', 'extract_2'], null],
      ['synthesize', 'synthesize', MODELS.sonnet, ['compare'], null],
    ]);
    expect(spec.executionPlan).toEqual({
      maxParallelNodes: 2,
      totalEstimatedTimeSeconds: 43,
      enableStreaming: false,
    });
    expect(spec.nodes[0]?.instruction).toBe(
      'Extract the key facts, figures and claims from a.pdf that bear on: Compare these two reports'
    );
    expect(spec.nodes[2]?.instruction).toBe(
      'Compare the extracted content from extract_1, extract_2. Identify agreements, differences and gaps relevant to: Compare these two reports'
    );
    expect(spec.workflowId).toBe('wf_test');
    expect(spec.createdAt).toBe('2026-03-01T10:20:30.000Z');
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it('uses the profile for models, timeouts and estimates', () => {
    const spec = compileOk('Compare these two reports', ['a.pdf', 'b.pdf'], getProfile('speed'));
    expect(new Set(spec.nodes.map(n => n.modelId))).toEqual(new Set([MODELS.haiku]));
    expect(spec.nodes.every(n => n.timeoutMs === 20_000)).toBe(true);
    expect(spec.executionPlan.totalEstimatedTimeSeconds).toBe(4 + 7 + 9);
    expect(spec.executionPlan.maxParallelNodes).toBe(2);
  });

  it('caps parallelism at the profile limit', () => {
    const files = ['1.pdf', '2.pdf', '3.pdf', '4.pdf', '5.pdf'];
    expect(compileOk('Compare these reports', files).executionPlan.maxParallelNodes).toBe(3);
    expect(compileOk('Compare these reports', files, withMaxParallel(getProfile('balanced'), 1)).executionPlan.maxParallelNodes).toBe(1);
  });

  it('wires per-file stages pairwise', () => {
    const spec = compileOk('Verify the claims', ['a.txt', 'b.txt', 'c.txt']);
    expect(spec.pattern.type).toBe('fact_checking');

    const byId = new Map(spec.nodes.map(n => [n.nodeId, n]));
    expect(byId.get('verify_2')?.inputFrom).toEqual(['extract_2']);
    expect(byId.get('verify_2')?.instruction).toBe(
      'Check each claim from extract_2 for supporting or contradicting evidence in b.txt.'
    );
    expect(byId.get('verify_2')?.parallelGroup).toBe('verify_group');
    expect(byId.get('classify')?.inputFrom).toEqual(['verify_1', 'verify_2', 'verify_3']);
    expect(byId.get('report')?.inputFrom).toEqual(['classify']);
    expect(spec.nodes).toHaveLength(8);
  });

  it('compiles Simple Q&A without files into a single answer node', () => {
    const spec = compileOk('What is the refund policy?', []);
    expect(spec.nodes.map(n => n.nodeId)).toEqual(['answer']);
    expect(spec.nodes[0]?.inputFrom).toEqual([]);
    expect(spec.nodes[0]?.instruction).toBe(
      'Answer the question "What is the refund policy?" using the extracted passages (none).'
    );
    expect(spec.executionPlan).toEqual({ maxParallelNodes: 1, totalEstimatedTimeSeconds: 10, enableStreaming: false });
  });

  it('streams refinement workflows and reads both draft and review', () => {
    const spec = compileOk('Refine this draft', ['notes.md']);
    expect(spec.pattern.type).toBe('iterative_refine');
    expect(spec.executionPlan.enableStreaming).toBe(true);
    const final = spec.nodes.find(n => n.nodeId === 'final');
    expect(final?.inputFrom).toEqual(['draft', 'review']);
    expect(final?.instruction).toBe('Revise the draft using the review (draft, review) into a final version for: Refine this draft');
  });

  it('every compiled workflow satisfies the DAG invariants', () => {
    const random = prng(7);
    for (const pattern of PATTERN_CATALOG) {
      for (const profile of listProfiles()) {
        const fileCount = 1 + Math.floor(random() * 6);
        const files = Array.from({ length: fileCount }, (_, i) => `doc${i}.pdf`);
        const result = compile(pattern, 'query', files, profile);
        if (!result.ok) throw new Error(`${pattern.type}/${profile.name} failed to compile`);

        expect(validateDag(result.spec.nodes).valid).toBe(true);
        expect(result.spec.executionPlan.maxParallelNodes).toBeLessThanOrEqual(profile.maxParallelNodes);
        expect(result.spec.executionPlan.maxParallelNodes).toBeGreaterThanOrEqual(1);
      }
    }
  });

  it('reports missing files for patterns that need them', () => {
    const result = compile(getPattern('research_synthesis'), 'Synthesize the research', [], getProfile('balanced'));
    expect(result).toEqual({
      ok: false,
      errors: [{ code: 'missing_files', message: 'Pattern "Research Synthesis" needs at least one input file' }],
    });
  });

  it('reports every operation the profile has no model for', () => {
    const partial: OptimizationProfile = {
      name: 'extract-only',
      description: '',
      maxParallelNodes: 2,
      operations: { extract: { modelId: 'model-small', latencySeconds: 1, costUnits: 0, timeoutMs: 1000 } },
    };
    const result = compile(getPattern('multi_document_compare'), 'q', ['a.pdf'], partial);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toEqual([
        { code: 'missing_model', message: 'Profile "extract-only" has no model for operation "compare"' },
        { code: 'missing_model', message: 'Profile "extract-only" has no model for operation "synthesize"' },
      ]);
    }
  });

  it('rejects a profile with invalid parallelism', () => {
    const result = compile(getPattern('simple_qa'), 'q', [], withMaxParallel(getProfile('balanced'), 0));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.errors.map(e => e.code)).toEqual(['invalid_profile']);
  });

  it('generates workflow ids from the creation time', () => {
    expect(generateWorkflowId(NOW)).toMatch(/^wf_20260301_102030_[0-9a-f]{8}$/);
    expect(generateWorkflowId(NOW)).not.toBe(generateWorkflowId(NOW));
  });

  it('renders every placeholder', () => {
    expect(renderInstruction('{query}|{file}|{file_index}|{inputs}|{query}', {
      query: 'q', file: 'f.pdf', fileIndex: '2', inputs: ['a', 'b'],
    })).toBe('q|f.pdf|2|a, b|q');
  });

  it('inserts the query and file names literally', () => {
    const values = { query: 'price $& and $$5', file: "it's $'.pdf", fileIndex: '1', inputs: [] };
    expect(renderInstruction('Q: {query} F: {file}', values)).toBe("Q: price $& and $$5 F: it's $'.pdf");

    expect(renderInstruction('{query} / {inputs}', {
      query: 'explain {file} and {inputs}', file: 'a.pdf', fileIndex: '1', inputs: ['x'],
    })).toBe('explain {file} and {inputs} / x');
  });

  it('compiles a query containing placeholders unchanged into the instruction', () => {
    const result = compile(getPattern('simple_qa'), 'what is {file_index}?', ['a.pdf'], getProfile('speed'), { workflowId: 'wf_t', now: NOW });
    if (!result.ok) throw new Error('compile failed');
    expect(result.spec.nodes.map(n => n.instruction)).toEqual([
      'Extract the passages from a.pdf relevant to: what is {file_index}?',
      'Answer the question "what is {file_index}?" using the extracted passages (extract_1).',
    ]);
  });

  it('never grows the estimated time when another file joins a parallel group', () => {
    const files = (n: number): string[] => Array.from({ length: n }, (_, i) => `doc${i + 1}.pdf`);
    const estimate = (type: WorkflowSpec['pattern']['type'], profile: OptimizationProfile, n: number): number => {
      const result = compile(getPattern(type), 'q', files(n), profile, { workflowId: 'wf_t', now: NOW });
      if (!result.ok) throw new Error(result.errors.map(e => e.message).join('; '));
      return result.spec.executionPlan.totalEstimatedTimeSeconds;
    };

    for (const pattern of PATTERN_CATALOG) {
      for (const profile of listProfiles()) {
        for (let n = 1; n < 8; n++) {
          expect(estimate(pattern.type, profile, n + 1)).toBeLessThanOrEqual(estimate(pattern.type, profile, n));
        }
      }
    }
    expect(estimate('multi_document_compare', getProfile('balanced'), 2)).toBe(43);
    expect(estimate('multi_document_compare', getProfile('balanced'), 9)).toBe(43);
  });
});

// ─── Profiles ────────────────────────────────────────────────────

describe('Optimization profiles', () => {
  it('ships speed, balanced and quality', () => {
    expect(listProfiles().map(p => [p.name, p.maxParallelNodes])).toEqual([
      ['speed', 8],
      ['balanced', 3],
      ['quality', 2],
    ]);
    expect(getProfile('balanced').operations.extract?.modelId).toBe(MODELS.haiku);
    expect(getProfile('balanced').operations.synthesize?.modelId).toBe(MODELS.sonnet);
    expect(getProfile('quality').operations.extract?.modelId).toBe(MODELS.sonnet);
  });

  it('parses a custom YAML profile extending a built-in', () => {
    const result = parseProfile(`
name: local
extends: balanced
maxParallelNodes: 5
operations:
  compare:
    modelId: local-model
    latencySeconds: 3
`);
    if (!result.ok) throw new Error(result.errors.join('; '));
    expect(result.profile.name).toBe('local');
    expect(result.profile.maxParallelNodes).toBe(5);
    expect(result.profile.operations.compare).toEqual({
      modelId: 'local-model',
      latencySeconds: 3,
      costUnits: 0,
      timeoutMs: 30_000,
    });
    expect(result.profile.operations.extract).toEqual(getProfile('balanced').operations.extract);
  });

  it('rejects unknown operations, bad numbers and missing parallelism', () => {
    const result = parseProfile(`
name: broken
operations:
  translate:
    modelId: m
    latencySeconds: 1
  extract:
    modelId: m
    latencySeconds: -1
`);
    expect(result).toEqual({
      ok: false,
      errors: [
        '"maxParallelNodes" is required unless the profile extends a built-in',
        'Unknown operation "translate"',
        'Operation "extract": "latencySeconds" must be a positive number',
        'Profile must define at least one operation (directly or via "extends")',
      ],
    });
  });

  it('rejects timeouts a timer cannot hold', () => {
    const result = parseProfile(`
name: slow
extends: balanced
operations:
  compare:
    modelId: m
    latencySeconds: 1
    timeoutMs: 3000000000
`);
    expect(result).toEqual({
      ok: false,
      errors: ['Operation "compare": "timeoutMs" must be a positive number no greater than 2147483647'],
    });

    const atLimit = parseProfile(`
name: slow
extends: balanced
operations:
  compare:
    modelId: m
    latencySeconds: 1
    timeoutMs: 2147483647
`);
    if (!atLimit.ok) throw new Error(atLimit.errors.join('; '));
    expect(atLimit.profile.operations.compare?.timeoutMs).toBe(MAX_TIMEOUT_MS);
  });

  it('reports YAML syntax errors', () => {
    const result = parseProfile('name: [unclosed');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.errors[0]).toMatch(/^YAML parse error:/);
  });
});

// ─── Serialization & Cost ────────────────────────────────────────

describe('Workflow descriptor', () => {
  it('round-trips a compiled workflow', () => {
    const spec = compileOk('Compare these two reports', ['a.pdf', 'b.pdf']);
    const descriptor = toWorkflowDescriptor(spec);

    expect(descriptor.pattern_name).toBe('Comparative Analysis');
    expect(descriptor.estimated_cost_factor).toBe(2.5);
    expect(descriptor.execution_plan).toEqual({
      max_parallel_nodes: 2,
      total_estimated_time_seconds: 43,
      enable_streaming: false,
    });
    expect(descriptor.dag_nodes[2]).toEqual({
      node_id: 'compare',
      operation: 'compare',
      model_id: MODELS.sonnet,
      instruction: spec.nodes[2]?.instruction,
      input_from: ['extract_1', 'extract_2'],
      parallel_group: null,
      timeout_ms: 60_000,
      estimated_latency_seconds: 15,
      estimated_cost_units: 0.3,
    });

    const parsed = parseWorkflowDescriptor(JSON.parse(JSON.stringify(descriptor)));
    if (!parsed.ok) throw new Error(parsed.errors.join('; '));
    expect(parsed.spec.nodes).toEqual(spec.nodes);
    expect(parsed.spec.executionPlan).toEqual(spec.executionPlan);
    expect(parsed.spec.pattern).toBe(spec.pattern);
  });

  it('rejects descriptors that violate DAG invariants', () => {
    const descriptor = toWorkflowDescriptor(compileOk('Compare these two reports', ['a.pdf', 'b.pdf']));
    const broken = {
      ...descriptor,
      dag_nodes: descriptor.dag_nodes.map(n => (n.node_id === 'extract_1' ? { ...n, input_from: ['synthesize'] } : n)),
    };
    const result = parseWorkflowDescriptor(broken);
    expect(result).toEqual({
      ok: false,
      errors: ['Node "extract_1" depends on "synthesize", which is not declared before it'],
    });
  });

  it('rejects malformed descriptors field by field', () => {
    const result = parseWorkflowDescriptor({ workflow_id: '', pattern_type: 'nope', query: 'q', files: [], dag_nodes: [] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toEqual([
        '"workflow_id" is required and must be a non-empty string',
        '"pattern_type" or "pattern_name" must name a catalog pattern',
        '"dag_nodes" must be a non-empty array',
        '"execution_plan" must be an object',
      ]);
    }
  });

  it('rejects a node timeout a timer cannot hold', () => {
    const descriptor = toWorkflowDescriptor(compileOk('Compare these two reports', ['a.pdf', 'b.pdf']));
    const result = parseWorkflowDescriptor({
      ...descriptor,
      dag_nodes: descriptor.dag_nodes.map(n => (n.node_id === 'compare' ? { ...n, timeout_ms: 3_000_000_000 } : n)),
    });
    expect(result).toEqual({
      ok: false,
      errors: ['dag_nodes[2]: "timeout_ms" must be a positive number no greater than 2147483647'],
    });
  });

  it('accepts a minimal descriptor that names its pattern by display name', () => {
    const result = parseWorkflowDescriptor({
      workflow_id: 'wf_minimal',
      pattern_name: 'Comparative Analysis',
      complexity_score: 0.6,
      estimated_cost_factor: 2.5,
      dag_nodes: [
        { node_id: 'extract_1', operation: 'extract', model_id: 'm', instruction: 'read a', input_from: [], parallel_group: 'extract_group' },
        { node_id: 'extract_2', operation: 'extract', model_id: 'm', instruction: 'read b', input_from: [], parallel_group: 'extract_group' },
        { node_id: 'compare', operation: 'compare', model_id: 'm', instruction: 'diff', input_from: ['extract_1', 'extract_2'], parallel_group: null },
      ],
      execution_plan: { max_parallel_nodes: 2, total_estimated_time_seconds: 10, enable_streaming: false },
    });
    if (!result.ok) throw new Error(result.errors.join('; '));
    expect(result.spec.workflowId).toBe('wf_minimal');
    expect(result.spec.pattern).toBe(getPattern('multi_document_compare'));
    expect(result.spec.query).toBe('');
    expect(result.spec.files).toEqual([]);
    expect(result.spec.profileName).toBe('custom');
    expect(result.spec.nodes.map(n => [n.nodeId, n.timeoutMs])).toEqual([
      ['extract_1', 30_000],
      ['extract_2', 30_000],
      ['compare', 30_000],
    ]);
  });

  it('rejects an unknown pattern name when no pattern type is given', () => {
    const result = parseWorkflowDescriptor({
      workflow_id: 'wf_x',
      pattern_name: 'Astrology',
      dag_nodes: [{ node_id: 'a', operation: 'extract', model_id: 'm', instruction: 'i', input_from: [] }],
      execution_plan: { max_parallel_nodes: 1, total_estimated_time_seconds: 1, enable_streaming: false },
    });
    expect(result).toEqual({ ok: false, errors: ['"pattern_type" or "pattern_name" must name a catalog pattern'] });
  });
});

describe('Cost estimation', () => {
  it('prices the pattern and the nodes against the baseline unit cost', () => {
    const estimate = estimateWorkflowCost(compileOk('Compare these two reports', ['a.pdf', 'b.pdf']));
    expect(estimate.baseUnitCostUsd).toBe(1.5);
    expect(estimate.patternCostUsd).toBe(3.75);
    expect(estimate.nodeCostUsd).toBeCloseTo(1.05, 6);
    expect(estimate.perNode.map(n => n.costUsd)).toEqual([0.075, 0.075, 0.45, 0.45]);
  });

  it('scales with a configured baseline', () => {
    const estimate = estimateWorkflowCost(compileOk('Compare these two reports', ['a.pdf', 'b.pdf']), 2);
    expect(estimate.patternCostUsd).toBe(5);
  });

  it('tabulates every pattern under every profile', () => {
    const rows = buildCostTable(listProfiles(), 3);
    expect(rows).toHaveLength(PATTERN_CATALOG.length * 3);
    const compareBalanced = rows.find(r => r.patternType === 'multi_document_compare' && r.profileName === 'balanced');
    expect(compareBalanced).toEqual({
      patternType: 'multi_document_compare',
      patternName: 'Comparative Analysis',
      profileName: 'balanced',
      nodeCount: 5,
      patternCostUsd: 3.75,
      nodeCostUsd: 1.125,
      estimatedSeconds: 43,
    });
  });
});
