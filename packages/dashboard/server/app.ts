/**
 * docweave Dashboard API
 *
 * Express app over a RunStore and an EventBus: REST endpoints under
 * /api plus an SSE stream of live run events. Built separately from the
 * listener so tests can mount it on an ephemeral port.
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { EventBus, RunStore } from '@docweave/shared';
import { createRoutes } from './routes.js';
import type { RouteOptions } from './routes.js';

export function createApp(store: RunStore, bus: EventBus, options: RouteOptions = {}): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use('/api', createRoutes(store, bus, options));

  app.use('/api', (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies and anything a route throws
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500;
    if (status >= 500) {
      console.error('[dashboard] Request failed:', err);
    }
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : 'Bad request' });
  });

  return app;
}

export { createRoutes };
export type { RouteOptions };
