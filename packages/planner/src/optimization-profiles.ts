/**
 * Optimization Profiles — Model, latency, cost and timeout per operation
 *
 * speed:    Haiku everywhere, 8 parallel
 * balanced: Haiku for extraction-type work, Sonnet for reasoning, 3 parallel
 * quality:  Sonnet everywhere, 2 parallel
 *
 * Latencies are per-call estimates in seconds; cost units multiply the
 * baseline unit cost. Both are data: extend with a custom profile
 * (see profile-parser.ts) rather than code.
 */

import type { OperationKind } from '@docweave/shared';
import type { BuiltinProfileName, OperationSettings, OptimizationProfile } from './types.js';

export const MODELS = {
  haiku: 'anthropic.claude-3-haiku-20240307-v1:0',
  sonnet: 'anthropic.claude-3-sonnet-20240229-v1:0',
} as const;

export const BUILTIN_PROFILE_NAMES: readonly BuiltinProfileName[] = ['speed', 'balanced', 'quality'];

export const DEFAULT_PROFILE_NAME: BuiltinProfileName = 'balanced';

function op(modelId: string, latencySeconds: number, costUnits: number, timeoutMs: number): OperationSettings {
  return { modelId, latencySeconds, costUnits, timeoutMs };
}

const SPEED_OPERATIONS: Record<OperationKind, OperationSettings> = {
  extract:    op(MODELS.haiku, 4, 0.05, 20_000),
  summarize:  op(MODELS.haiku, 5, 0.05, 20_000),
  classify:   op(MODELS.haiku, 3, 0.05, 20_000),
  compare:    op(MODELS.haiku, 7, 0.05, 20_000),
  verify:     op(MODELS.haiku, 6, 0.05, 20_000),
  synthesize: op(MODELS.haiku, 9, 0.08, 20_000),
  refine:     op(MODELS.haiku, 8, 0.08, 20_000),
  answer:     op(MODELS.haiku, 5, 0.05, 20_000),
};

const BALANCED_OPERATIONS: Record<OperationKind, OperationSettings> = {
  extract:    op(MODELS.haiku, 8, 0.05, 30_000),
  summarize:  op(MODELS.haiku, 10, 0.05, 30_000),
  classify:   op(MODELS.haiku, 5, 0.05, 30_000),
  compare:    op(MODELS.sonnet, 15, 0.3, 60_000),
  verify:     op(MODELS.sonnet, 12, 0.3, 60_000),
  synthesize: op(MODELS.sonnet, 20, 0.3, 60_000),
  refine:     op(MODELS.sonnet, 18, 0.3, 60_000),
  answer:     op(MODELS.sonnet, 10, 0.3, 60_000),
};

const QUALITY_OPERATIONS: Record<OperationKind, OperationSettings> = {
  extract:    op(MODELS.sonnet, 12, 0.3, 90_000),
  summarize:  op(MODELS.sonnet, 14, 0.3, 90_000),
  classify:   op(MODELS.sonnet, 8, 0.3, 90_000),
  compare:    op(MODELS.sonnet, 20, 0.3, 90_000),
  verify:     op(MODELS.sonnet, 16, 0.3, 90_000),
  synthesize: op(MODELS.sonnet, 25, 0.4, 90_000),
  refine:     op(MODELS.sonnet, 24, 0.4, 90_000),
  answer:     op(MODELS.sonnet, 14, 0.3, 90_000),
};

const PROFILES: Record<BuiltinProfileName, OptimizationProfile> = {
  speed: {
    name: 'speed',
    description: 'Fastest and cheapest: Haiku for every operation, up to 8 nodes in parallel',
    maxParallelNodes: 8,
    operations: SPEED_OPERATIONS,
  },
  balanced: {
    name: 'balanced',
    description: 'Haiku for extraction, Sonnet for comparison and synthesis, up to 3 nodes in parallel',
    maxParallelNodes: 3,
    operations: BALANCED_OPERATIONS,
  },
  quality: {
    name: 'quality',
    description: 'Sonnet for every operation, up to 2 nodes in parallel',
    maxParallelNodes: 2,
    operations: QUALITY_OPERATIONS,
  },
};

export function isBuiltinProfileName(value: unknown): value is BuiltinProfileName {
  return typeof value === 'string' && BUILTIN_PROFILE_NAMES.some(n => n === value);
}

export function getProfile(name: BuiltinProfileName): OptimizationProfile {
  return PROFILES[name];
}

export function listProfiles(): OptimizationProfile[] {
  return BUILTIN_PROFILE_NAMES.map(name => PROFILES[name]);
}

/**
 * Copy of a profile with a different parallelism cap (CLI --parallel).
 */
export function withMaxParallel(profile: OptimizationProfile, maxParallelNodes: number): OptimizationProfile {
  return { ...profile, maxParallelNodes };
}
