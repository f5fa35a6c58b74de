/**
 * Run Sinks — where finished reports go
 *
 * The executor hands every report to its sinks and never reads them
 * back. RunStore is the durable one; the console sink prints a one-line
 * summary per run.
 */

import type { ExecutionReport, RunStore } from '@docweave/shared';
import { toWorkflowDescriptor } from '@docweave/planner';
import type { WorkflowSpec } from '@docweave/planner';
import type { RunSink } from './types.js';

/**
 * Persist the workflow (once) and the run into a RunStore.
 */
export function createRunStoreSink(store: RunStore): RunSink {
  return {
    record(report: ExecutionReport, spec: WorkflowSpec): void {
      store.saveWorkflow(toWorkflowDescriptor(spec));
      store.recordRun(report);
    },
  };
}

export function createConsoleSink(write: (line: string) => void = line => console.log(line)): RunSink {
  return {
    record(report: ExecutionReport): void {
      const failed = report.nodes.filter(n => n.status === 'failed').length;
      const skipped = report.nodes.filter(n => n.status === 'skipped').length;
      write(
        `[docweave] ${report.runId} ${report.status}${report.cancelled ? ' (cancelled)' : ''}`
        + ` in ${report.durationMs}ms: ${report.nodes.length - failed - skipped} succeeded,`
        + ` ${failed} failed, ${skipped} skipped`
      );
    },
  };
}
