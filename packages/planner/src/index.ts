/**
 * @docweave/planner — Query → execution DAG
 *
 * Classify a query against the pattern catalog, resolve models from an
 * optimization profile and compile a frozen, validated workflow.
 */

export const VERSION = '0.1.0';

// ─── Pattern Catalog ─────────────────────────────────────────────
export {
  PATTERN_CATALOG,
  DEFAULT_PATTERN_TYPE,
  getPattern,
  getDefaultPattern,
  catalogIndex,
} from './pattern-catalog.js';

// ─── Pattern Classifier ──────────────────────────────────────────
export { classify, scorePattern, scorePatterns, fileExtension } from './pattern-classifier.js';

// ─── Optimization Profiles ───────────────────────────────────────
export {
  MODELS,
  BUILTIN_PROFILE_NAMES,
  DEFAULT_PROFILE_NAME,
  isBuiltinProfileName,
  getProfile,
  listProfiles,
  withMaxParallel,
} from './optimization-profiles.js';
export { parseProfile, validateProfile, DEFAULT_OPERATION_TIMEOUT_MS, MAX_TIMEOUT_MS } from './profile-parser.js';

// ─── DAG Compiler ────────────────────────────────────────────────
export { compile, createWorkflowFromQuery, generateWorkflowId, renderInstruction } from './dag-compiler.js';
export {
  DagBuilder,
  validateDag,
  validateParallelGroups,
  criticalPath,
  widestParallelGroup,
  leafNodes,
  dependentsOf,
} from './dag-builder.js';
export type { BuildResult, CriticalPath } from './dag-builder.js';

// ─── Serialization & Cost ────────────────────────────────────────
export { toWorkflowDescriptor, parseWorkflowDescriptor } from './workflow-serializer.js';
export {
  estimateWorkflowCost,
  nodeCostUsd,
  roundUsd,
  buildCostTable,
  DEFAULT_BASE_UNIT_COST_USD,
} from './cost-estimator.js';
export type { NodeCost, WorkflowCostEstimate, CostTableRow } from './cost-estimator.js';

// ─── Types ───────────────────────────────────────────────────────
export type {
  FanOut,
  NodeTemplate,
  Pattern,
  PatternMatch,
  OperationSettings,
  OperationTable,
  OptimizationProfile,
  BuiltinProfileName,
  DagNode,
  ExecutionPlan,
  WorkflowSpec,
  CompileErrorCode,
  CompileError,
  CompileResult,
  ProfileParseResult,
  DescriptorParseResult,
  ValidationResult,
  CompileOptions,
} from './types.js';
