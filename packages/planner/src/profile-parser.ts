/**
 * Profile Parser — Parse custom optimization profiles from YAML.
 *
 * Example:
 *
 *   name: local-llama
 *   extends: balanced          # optional, inherit a built-in table
 *   maxParallelNodes: 4
 *   operations:
 *     extract:
 *       modelId: meta.llama2-13b-chat-v1
 *       latencySeconds: 6
 *       costUnits: 0.02
 *       timeoutMs: 45000       # optional, default 30000
 *
 * Operation keys outside the closed OperationKind set are rejected here,
 * so a typo never turns into a silent missing model at compile time.
 */

import yaml from 'js-yaml';
import { isOperationKind } from '@docweave/shared';
import { getProfile, isBuiltinProfileName, BUILTIN_PROFILE_NAMES } from './optimization-profiles.js';
import type { OperationSettings, OperationTable, ProfileParseResult } from './types.js';

export const DEFAULT_OPERATION_TIMEOUT_MS = 30_000;

/** Largest delay a timer honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function isValidTimeoutMs(value: unknown): value is number {
  return isPositiveNumber(value) && value <= MAX_TIMEOUT_MS;
}

/**
 * Parse a YAML string into a validated OptimizationProfile.
 */
export function parseProfile(yamlString: string): ProfileParseResult {
  let raw: unknown;
  try {
    raw = yaml.load(yamlString);
  } catch (err) {
    return { ok: false, errors: [`YAML parse error: ${err instanceof Error ? err.message : String(err)}`] };
  }

  return validateProfile(raw);
}

/**
 * Validate a raw object (already parsed from YAML/JSON) into a profile.
 */
export function validateProfile(raw: unknown): ProfileParseResult {
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Profile definition must be an object'] };
  }

  const errors: string[] = [];

  if (typeof raw.name !== 'string' || raw.name.trim() === '') {
    errors.push('Profile "name" is required and must be a non-empty string');
  }

  if (raw.description !== undefined && typeof raw.description !== 'string') {
    errors.push('"description" must be a string if provided');
  }

  let operations: OperationTable = {};
  let inheritedParallel: number | undefined;
  if (raw.extends !== undefined) {
    if (isBuiltinProfileName(raw.extends)) {
      const base = getProfile(raw.extends);
      operations = { ...base.operations };
      inheritedParallel = base.maxParallelNodes;
    } else {
      errors.push(`"extends" must be one of: ${BUILTIN_PROFILE_NAMES.join(', ')}`);
    }
  }

  let maxParallelNodes = inheritedParallel;
  if (raw.maxParallelNodes !== undefined) {
    if (!isPositiveInteger(raw.maxParallelNodes)) {
      errors.push('"maxParallelNodes" must be a positive integer');
    } else {
      maxParallelNodes = raw.maxParallelNodes;
    }
  } else if (maxParallelNodes === undefined) {
    errors.push('"maxParallelNodes" is required unless the profile extends a built-in');
  }

  if (raw.operations !== undefined) {
    if (!isRecord(raw.operations)) {
      errors.push('"operations" must be an object keyed by operation');
    } else {
      for (const [key, value] of Object.entries(raw.operations)) {
        if (!isOperationKind(key)) {
          errors.push(`Unknown operation "${key}"`);
          continue;
        }
        const parsed = parseOperation(key, value);
        errors.push(...parsed.errors);
        if (parsed.settings) {
          operations[key] = parsed.settings;
        }
      }
    }
  }

  if (Object.keys(operations).length === 0) {
    errors.push('Profile must define at least one operation (directly or via "extends")');
  }

  if (errors.length > 0 || typeof raw.name !== 'string' || maxParallelNodes === undefined) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    profile: {
      name: raw.name,
      description: typeof raw.description === 'string' ? raw.description : '',
      maxParallelNodes,
      operations,
    },
  };
}

function parseOperation(
  key: string,
  raw: unknown
): { settings: OperationSettings | null; errors: string[] } {
  const prefix = `Operation "${key}"`;
  if (!isRecord(raw)) {
    return { settings: null, errors: [`${prefix}: must be an object`] };
  }

  const errors: string[] = [];

  if (typeof raw.modelId !== 'string' || raw.modelId === '') {
    errors.push(`${prefix}: "modelId" is required and must be a string`);
  }
  if (!isPositiveNumber(raw.latencySeconds)) {
    errors.push(`${prefix}: "latencySeconds" must be a positive number`);
  }
  if (raw.costUnits !== undefined && !isNonNegativeNumber(raw.costUnits)) {
    errors.push(`${prefix}: "costUnits" must be a non-negative number`);
  }
  if (raw.timeoutMs !== undefined && !isValidTimeoutMs(raw.timeoutMs)) {
    errors.push(`${prefix}: "timeoutMs" must be a positive number no greater than ${MAX_TIMEOUT_MS}`);
  }

  if (errors.length > 0 || typeof raw.modelId !== 'string' || !isPositiveNumber(raw.latencySeconds)) {
    return { settings: null, errors };
  }

  return {
    settings: {
      modelId: raw.modelId,
      latencySeconds: raw.latencySeconds,
      costUnits: isNonNegativeNumber(raw.costUnits) ? raw.costUnits : 0,
      timeoutMs: isValidTimeoutMs(raw.timeoutMs) ? raw.timeoutMs : DEFAULT_OPERATION_TIMEOUT_MS,
    },
    errors,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isPositiveInteger(value: unknown): value is number {
  return isPositiveNumber(value) && Number.isInteger(value);
}
