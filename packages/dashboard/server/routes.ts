/**
 * Dashboard API Routes
 *
 * Views over the pattern catalog, the built-in profiles and the run store,
 * a dry-run analyze endpoint, and an SSE stream that forwards every
 * EventBus event. Runs started with POST /runs execute in this process on
 * that bus; runs from a separate `docweave run` only show up in the store.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { EventBus, RunStore, RunStatus } from '@docweave/shared';
import {
  PATTERN_CATALOG,
  compile,
  classify,
  scorePatterns,
  estimateWorkflowCost,
  getProfile,
  isBuiltinProfileName,
  listProfiles,
  parseWorkflowDescriptor,
  toWorkflowDescriptor,
  BUILTIN_PROFILE_NAMES,
  DEFAULT_BASE_UNIT_COST_USD,
  DEFAULT_PROFILE_NAME,
} from '@docweave/planner';
import type { BuiltinProfileName } from '@docweave/planner';
import { createMockInvoker, createRunStoreSink, execute } from '@docweave/runner';
import type { ModelInvoker } from '@docweave/runner';

export interface RouteOptions {
  baseUnitCostUsd?: number;
  defaultProfile?: BuiltinProfileName;
  /** Invoker for POST /runs; requests may ask for the mock instead. */
  invoke?: ModelInvoker;
}

const RUN_STATUSES: readonly RunStatus[] = ['succeeded', 'partial', 'failed'];
const MAX_RUN_LIMIT = 200;

export function createRoutes(store: RunStore, bus: EventBus, options: RouteOptions = {}): Router {
  const router = Router();
  const baseUnitCostUsd = options.baseUnitCostUsd ?? DEFAULT_BASE_UNIT_COST_USD;
  const defaultProfile = options.defaultProfile ?? DEFAULT_PROFILE_NAME;

  // ─── Catalog ───────────────────────────────────────────────────

  router.get('/patterns', (_req: Request, res: Response) => {
    res.json(PATTERN_CATALOG.map(p => ({
      type: p.type,
      name: p.name,
      description: p.description,
      complexityScore: p.complexityScore,
      costFactor: p.costFactor,
      estimatedCostUsd: p.costFactor * baseUnitCostUsd,
      streaming: p.streaming,
      requiresFiles: p.requiresFiles,
      intentKeywords: p.intentKeywords,
      fileTypeHints: p.fileTypeHints,
      steps: p.template.map(t => ({ key: t.key, operation: t.operation, fanOut: t.fanOut, inputs: t.inputs })),
    })));
  });

  router.get('/profiles', (_req: Request, res: Response) => {
    res.json(listProfiles());
  });

  // ─── Analyze ───────────────────────────────────────────────────

  router.post('/analyze', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null) {
      res.status(400).json({ error: 'Expected a JSON body' });
      return;
    }

    const query = 'query' in body ? body.query : undefined;
    const files = 'files' in body ? body.files : [];
    const profileName = 'profile' in body ? body.profile : defaultProfile;

    if (typeof query !== 'string' || query.trim() === '') {
      res.status(400).json({ error: '"query" must be a non-empty string' });
      return;
    }
    if (!Array.isArray(files) || !files.every((f): f is string => typeof f === 'string')) {
      res.status(400).json({ error: '"files" must be an array of strings' });
      return;
    }
    if (!isBuiltinProfileName(profileName)) {
      res.status(400).json({ error: `"profile" must be one of: ${BUILTIN_PROFILE_NAMES.join(', ')}` });
      return;
    }

    const pattern = classify(query, files);
    const matches = scorePatterns(query, files).map(m => ({
      type: m.pattern.type,
      name: m.pattern.name,
      score: m.score,
      matchedKeywords: m.matchedKeywords,
      matchedExtensions: m.matchedExtensions,
    }));

    const result = compile(pattern, query, files, getProfile(profileName));
    if (!result.ok) {
      res.status(400).json({ error: 'Workflow could not be compiled', pattern: pattern.type, matches, details: result.errors });
      return;
    }

    res.json({
      pattern: pattern.type,
      matches,
      workflow: toWorkflowDescriptor(result.spec),
      estimate: estimateWorkflowCost(result.spec, baseUnitCostUsd),
    });
  });

  // ─── Runs & Workflows ──────────────────────────────────────────

  router.get('/runs', (req: Request, res: Response) => {
    const limit = Math.min(Math.max(parseInt(String(req.query.limit ?? '20'), 10) || 20, 1), MAX_RUN_LIMIT);
    const status = RUN_STATUSES.find(s => s === req.query.status);
    const workflowId = typeof req.query.workflowId === 'string' ? req.query.workflowId : undefined;

    if (req.query.status !== undefined && !status) {
      res.status(400).json({ error: `"status" must be one of: ${RUN_STATUSES.join(', ')}` });
      return;
    }
    res.json(store.listRuns({ limit, status, workflowId }));
  });

  router.post('/runs', (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    const workflowId = typeof body === 'object' && body !== null && 'workflowId' in body ? body.workflowId : undefined;
    const mock = typeof body === 'object' && body !== null && 'mock' in body && body.mock === true;

    if (typeof workflowId !== 'string' || workflowId === '') {
      res.status(400).json({ error: '"workflowId" must be a non-empty string' });
      return;
    }
    const descriptor = store.getWorkflow(workflowId);
    if (!descriptor) {
      res.status(404).json({ error: 'Workflow not found' });
      return;
    }
    const parsed = parseWorkflowDescriptor(descriptor);
    if (!parsed.ok) {
      res.status(422).json({ error: 'Stored workflow is invalid', details: parsed.errors });
      return;
    }
    const invoke = mock ? createMockInvoker() : options.invoke;
    if (!invoke) {
      res.status(503).json({ error: 'No model invoker configured: set DOCWEAVE_INVOKER_URL or pass "mock": true' });
      return;
    }

    execute(parsed.spec, invoke, { bus, sinks: [createRunStoreSink(store)], baseUnitCostUsd })
      .then(report => {
        res.status(201).json(report);
      })
      .catch(next);
  });

  router.get('/runs/:id', (req: Request, res: Response) => {
    const run = store.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json(run);
  });

  router.get('/workflows', (_req: Request, res: Response) => {
    res.json(store.listWorkflows());
  });

  router.get('/workflows/:id', (req: Request, res: Response) => {
    const workflow = store.getWorkflow(req.params.id);
    if (!workflow) {
      res.status(404).json({ error: 'Workflow not found' });
      return;
    }
    res.json(workflow);
  });

  router.get('/stats', (_req: Request, res: Response) => {
    res.json(store.getStats());
  });

  // ─── SSE: Real-time events ─────────────────────────────────────

  router.get('/events', (req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(': connected\n\n');

    const unsubscribe = bus.on('*', event => {
      res.write(`event: ${event.channel}\ndata: ${JSON.stringify(event)}\n\n`);
    });

    req.on('close', () => {
      unsubscribe();
    });
  });

  return router;
}
