// ──────────────────────────────────────────
// Express application
// ──────────────────────────────────────────

import express, { ErrorRequestHandler, Express } from 'express';
import { errorMessage } from './shared/errors';
import type { StoreLookup } from './platform/store';
import { AggregationJob, MetricsService, createAnalyticsRoutes } from './domains/analytics';

export interface HttpDeps {
  stores: StoreLookup;
  metricsService: MetricsService;
  aggregationJob: AggregationJob;
}

export function createHttpApp(deps: HttpDeps): Express {
  const app = express();
  app.use(express.json());

  app.use('/api/v1', createAnalyticsRoutes(deps.metricsService, deps.aggregationJob, deps.stores));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(handleBodyErrors);

  return app;
}

// Errors raised before a route runs (JSON body parsing)
const handleBodyErrors: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  console.error('[API] Unhandled error:', errorMessage(err));
  res.status(500).json({ error: 'Internal error' });
};
