/**
 * @docweave/cli — command implementations, usable without the CLI wrapper
 */

export const VERSION = '0.1.0';

export { loadConfig, resolveProfile, DEFAULT_DASHBOARD_PORT } from './config.js';
export type { DocweaveConfig } from './config.js';

export { patterns } from './commands/patterns.js';
export type { PatternsResult } from './commands/patterns.js';
export { analyze } from './commands/analyze.js';
export type { AnalyzeResult, AnalyzeOptions } from './commands/analyze.js';
export { create, expandFiles } from './commands/create.js';
export type { CreateResult, CreateOptions } from './commands/create.js';
export { run } from './commands/run.js';
export type { RunResult, RunOptions } from './commands/run.js';
export { costs } from './commands/costs.js';
export type { CostsResult, CostsOptions } from './commands/costs.js';
export { showConfig } from './commands/config.js';
export type { ConfigResult } from './commands/config.js';
export { history } from './commands/history.js';
export type { HistoryResult, HistoryOptions } from './commands/history.js';
export { results, formatExecution, isResultFormat, RESULT_FORMATS } from './commands/results.js';
export type { ResultsResult, ResultsOptions, ResultFormat } from './commands/results.js';

export { formatTable, formatUsd, formatSeconds } from './utils.js';
