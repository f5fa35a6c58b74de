/**
 * docweave config — Show resolved configuration and available profiles
 */

import { listProfiles } from '@docweave/planner';
import type { OptimizationProfile } from '@docweave/planner';
import { loadConfig, resolveProfile } from '../config.js';
import type { DocweaveConfig } from '../config.js';
import { formatUsd } from '../utils.js';

export interface ConfigResult {
  config: DocweaveConfig;
  profiles: OptimizationProfile[];
  defaultProfileValid: boolean;
  report: string;
}

export function showConfig(opts?: { config?: DocweaveConfig }): ConfigResult {
  const config = opts?.config ?? loadConfig();
  const profiles = listProfiles();
  const defaultProfile = resolveProfile(config.defaultProfile);

  const report = [
    '',
    '=== docweave Configuration ===',
    '',
    `  Home:            ${config.home}`,
    `  Run store:       ${config.dbPath}`,
    `  Config file:     ${config.configPath}`,
    `  Invoker URL:     ${config.invokerUrl ?? '(not set, use --mock)'}`,
    `  Base unit cost:  ${formatUsd(config.baseUnitCostUsd)}`,
    `  Default profile: ${config.defaultProfile}${defaultProfile.ok ? '' : ' (INVALID)'}`,
    `  Dashboard port:  ${config.port}`,
    '',
    '  Profiles:',
    ...profiles.map(p => `    ${p.name.padEnd(9)} ${p.description}`),
    '',
    ...config.warnings.map(w => `  Warning: ${w}`),
    ...(defaultProfile.ok ? [] : defaultProfile.errors.map(e => `  Error: ${e}`)),
  ].join('\n');

  return { config, profiles, defaultProfileValid: defaultProfile.ok, report };
}
