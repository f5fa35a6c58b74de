#!/usr/bin/env node

/**
 * docweave CLI — Compile document queries into model DAGs and run them
 *
 * Usage:
 *   docweave patterns                          List the pattern catalog
 *   docweave analyze <query> [files...]        Classify a query, preview its DAG
 *   docweave create --query <q> --files <f...> Compile a workflow file
 *   docweave run <workflow.json> [--mock]      Execute a workflow
 *   docweave costs                             Cost table per pattern × profile
 *   docweave config                            Show resolved configuration
 *   docweave history                           Recent runs
 *   docweave results <runId>                   Show a recorded run
 */

import { Command, InvalidArgumentError } from 'commander';
import { EventBus } from '@docweave/shared';
import type { RunStatus } from '@docweave/shared';
import { VERSION } from './index.js';
import { loadConfig } from './config.js';
import { patterns } from './commands/patterns.js';
import { analyze } from './commands/analyze.js';
import { create } from './commands/create.js';
import { run } from './commands/run.js';
import { costs } from './commands/costs.js';
import { showConfig } from './commands/config.js';
import { history } from './commands/history.js';
import { results, isResultFormat, RESULT_FORMATS } from './commands/results.js';

const RUN_STATUSES: readonly RunStatus[] = ['succeeded', 'partial', 'failed'];

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

function parseRunStatus(value: string): RunStatus {
  const status = RUN_STATUSES.find(s => s === value);
  if (!status) {
    throw new InvalidArgumentError(`Must be one of: ${RUN_STATUSES.join(', ')}.`);
  }
  return status;
}

function fail(): void {
  process.exitCode = 1;
}

const config = loadConfig();
for (const warning of config.warnings) {
  console.error(`[docweave] ${warning}`);
}

const program = new Command();

program
  .name('docweave')
  .description('Compile document-analysis queries into parallel model workflows')
  .version(VERSION);

program
  .command('patterns')
  .description('List the available execution patterns')
  .action(() => {
    console.log(patterns().report);
  });

program
  .command('analyze <query> [files...]')
  .description('Classify a query and preview the workflow it compiles to')
  .option('-c, --config <profile>', 'Profile name (speed, balanced, quality) or YAML profile path')
  .action((query: string, files: string[], opts: { config?: string }) => {
    const result = analyze(query, files, { profile: opts.config, config });
    console.log(result.report);
    if (!result.ok) fail();
  });

program
  .command('create')
  .description('Compile a query into a workflow file')
  .requiredOption('-q, --query <query>', 'The question to answer')
  .option('-f, --files <files...>', 'Input documents', [])
  .option('-c, --config <profile>', 'Profile name (speed, balanced, quality) or YAML profile path')
  .option('-p, --parallel <n>', 'Override the profile parallelism', parsePositiveInt)
  .option('-o, --output <path>', 'Where to write the workflow JSON')
  .option('--dry-run', 'Compile and print without writing anything')
  .action(async (opts: {
    query: string;
    files: string[];
    config?: string;
    parallel?: number;
    output?: string;
    dryRun?: boolean;
  }) => {
    const result = await create({
      query: opts.query,
      files: opts.files,
      profile: opts.config,
      parallel: opts.parallel,
      output: opts.output,
      dryRun: opts.dryRun,
      config,
      bus: new EventBus(),
    });
    console.log(result.report);
    if (!result.ok) fail();
  });

program
  .command('run <workflowFile>')
  .description('Execute a workflow file (Ctrl-C cancels the run)')
  .option('--mock', 'Use the offline mock invoker instead of the model gateway')
  .action(async (workflowFile: string, opts: { mock?: boolean }) => {
    const controller = new AbortController();
    const onSigint = (): void => controller.abort('interrupted');
    process.once('SIGINT', onSigint);

    try {
      const result = await run(workflowFile, {
        mock: opts.mock,
        signal: controller.signal,
        config,
        log: line => console.log(line),
      });
      console.log(result.report);
      if (!result.ok) fail();
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  });

program
  .command('costs')
  .description('Estimated cost and duration per pattern and profile')
  .option('-n, --files <count>', 'Representative number of input files', parsePositiveInt, 3)
  .action((opts: { files: number }) => {
    console.log(costs({ fileCount: opts.files, config }).report);
  });

program
  .command('config')
  .description('Show the resolved configuration')
  .action(() => {
    const result = showConfig({ config });
    console.log(result.report);
    if (!result.defaultProfileValid) fail();
  });

program
  .command('history')
  .description('List recent runs')
  .option('-n, --limit <n>', 'Number of runs to show', parsePositiveInt, 20)
  .option('-s, --status <status>', 'Only runs with this status', parseRunStatus)
  .action((opts: { limit: number; status?: RunStatus }) => {
    console.log(history({ limit: opts.limit, status: opts.status, config }).report);
  });

program
  .command('results <runId>')
  .description('Show the results of a recorded run')
  .option('--format <format>', `Output format (${RESULT_FORMATS.join(', ')})`, 'text')
  .action((runId: string, opts: { format: string }) => {
    if (!isResultFormat(opts.format)) {
      console.error(`Unknown format "${opts.format}". Use one of: ${RESULT_FORMATS.join(', ')}`);
      fail();
      return;
    }
    const result = results(runId, { format: opts.format, config });
    console.log(result.report);
    if (!result.found) fail();
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('[docweave] error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
