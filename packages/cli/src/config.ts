/**
 * docweave configuration
 *
 * Resolution order, per setting: environment > ~/.docweave/config.json > default.
 *
 *   DOCWEAVE_HOME           data directory (default ~/.docweave)
 *   DOCWEAVE_DB_PATH        run history database (default $DOCWEAVE_HOME/run-store.db)
 *   DOCWEAVE_INVOKER_URL    model gateway endpoint for the HTTP invoker
 *   DOCWEAVE_BASE_COST_USD  USD per cost unit (default 1.50)
 *   DOCWEAVE_PROFILE        default profile name or YAML path (default balanced)
 *   PORT                    dashboard port (default 3002)
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, extname } from 'path';
import {
  DEFAULT_BASE_UNIT_COST_USD,
  DEFAULT_PROFILE_NAME,
  BUILTIN_PROFILE_NAMES,
  getProfile,
  isBuiltinProfileName,
  parseProfile,
} from '@docweave/planner';
import type { ProfileParseResult } from '@docweave/planner';

export const DEFAULT_DASHBOARD_PORT = 3002;

export interface DocweaveConfig {
  home: string;
  dbPath: string;
  configPath: string;
  invokerUrl: string | null;
  baseUnitCostUsd: number;
  defaultProfile: string;
  port: number;
  warnings: string[];
}

interface FileConfig {
  defaultProfile?: string;
  baseUnitCostUsd?: number;
  invokerUrl?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DocweaveConfig {
  const home = env.DOCWEAVE_HOME || join(homedir(), '.docweave');
  const configPath = join(home, 'config.json');
  const warnings: string[] = [];
  const file = readFileConfig(configPath, warnings);

  let baseUnitCostUsd = file.baseUnitCostUsd ?? DEFAULT_BASE_UNIT_COST_USD;
  if (env.DOCWEAVE_BASE_COST_USD) {
    const parsed = Number(env.DOCWEAVE_BASE_COST_USD);
    if (Number.isFinite(parsed) && parsed >= 0) {
      baseUnitCostUsd = parsed;
    } else {
      warnings.push(`Ignoring DOCWEAVE_BASE_COST_USD="${env.DOCWEAVE_BASE_COST_USD}": not a non-negative number`);
    }
  }

  let port = DEFAULT_DASHBOARD_PORT;
  if (env.PORT) {
    const parsed = Number(env.PORT);
    if (Number.isInteger(parsed) && parsed >= 0 && parsed < 65536) {
      port = parsed;
    } else {
      warnings.push(`Ignoring PORT="${env.PORT}": not a valid port`);
    }
  }

  return {
    home,
    dbPath: env.DOCWEAVE_DB_PATH || join(home, 'run-store.db'),
    configPath,
    invokerUrl: env.DOCWEAVE_INVOKER_URL || file.invokerUrl || null,
    baseUnitCostUsd,
    defaultProfile: env.DOCWEAVE_PROFILE || file.defaultProfile || DEFAULT_PROFILE_NAME,
    port,
    warnings,
  };
}

function readFileConfig(configPath: string, warnings: string[]): FileConfig {
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    warnings.push(`Ignoring ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    warnings.push(`Ignoring ${configPath}: expected a JSON object`);
    return {};
  }

  const config: FileConfig = {};
  if ('defaultProfile' in raw && typeof raw.defaultProfile === 'string') {
    config.defaultProfile = raw.defaultProfile;
  }
  if ('baseUnitCostUsd' in raw && typeof raw.baseUnitCostUsd === 'number' && raw.baseUnitCostUsd >= 0) {
    config.baseUnitCostUsd = raw.baseUnitCostUsd;
  }
  if ('invokerUrl' in raw && typeof raw.invokerUrl === 'string') {
    config.invokerUrl = raw.invokerUrl;
  }
  return config;
}

/**
 * Resolve a profile reference: a built-in name, or a path to a YAML file.
 */
export function resolveProfile(ref: string): ProfileParseResult {
  if (isBuiltinProfileName(ref)) {
    return { ok: true, profile: getProfile(ref) };
  }

  const ext = extname(ref).toLowerCase();
  if ((ext === '.yaml' || ext === '.yml') && existsSync(ref)) {
    return parseProfile(readFileSync(ref, 'utf-8'));
  }

  return {
    ok: false,
    errors: [`Unknown profile "${ref}": expected ${BUILTIN_PROFILE_NAMES.join(', ')} or a path to a YAML profile`],
  };
}
