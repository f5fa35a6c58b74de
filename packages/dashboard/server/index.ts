/**
 * docweave Dashboard API Server
 *
 * Serves the run store written by `docweave run` (DOCWEAVE_DB_PATH or
 * $DOCWEAVE_HOME/run-store.db) on PORT (default 3002). POST /api/runs
 * uses the HTTP invoker when DOCWEAVE_INVOKER_URL is set.
 */

import { EventBus, RunStore } from '@docweave/shared';
import { isBuiltinProfileName } from '@docweave/planner';
import { createHttpInvoker } from '@docweave/runner';
import { loadConfig } from '@docweave/cli';
import { createApp } from './app.js';

const config = loadConfig();
for (const warning of config.warnings) {
  console.error(`[dashboard] ${warning}`);
}

const store = new RunStore(config.dbPath);
const bus = new EventBus();

const app = createApp(store, bus, {
  baseUnitCostUsd: config.baseUnitCostUsd,
  defaultProfile: isBuiltinProfileName(config.defaultProfile) ? config.defaultProfile : undefined,
  invoke: config.invokerUrl ? createHttpInvoker(config.invokerUrl) : undefined,
});

const server = app.listen(config.port, () => {
  console.log(`[dashboard] API server running on http://localhost:${config.port}`);
  console.log(`[dashboard] Run store: ${config.dbPath}`);
});

function shutdown(): void {
  server.close(() => {
    store.close();
    process.exit(0);
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

export { app, store, bus };
