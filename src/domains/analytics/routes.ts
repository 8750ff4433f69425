// ──────────────────────────────────────────
// Analytics: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { MetricsService } from './metrics.service';
import { AggregationJob } from './aggregation.job';
import type { StoreLookup } from '../../platform/store';
import type { Store } from '../../shared/types';
import { AppError, NotFoundError, ValidationError } from '../../shared/errors';
import { daysBetween, isIsoDate } from '../../shared/dates';

const isoDate = z.string().refine(isIsoDate, { message: 'must be a calendar date (YYYY-MM-DD)' });

const storeIdSchema = z.string().uuid();

const rangeQuery = z.object({ start: isoDate, end: isoDate });

const seriesQuery = rangeQuery.extend({
  granularity: z.enum(['daily', 'weekly', 'monthly']).default('daily'),
});

const computeBody = z.object({ date: isoDate });

/** Longest range a request may recompute or recalculate profit over. */
export const MAX_RANGE_DAYS = 366;

const spanMessage = `range may span at most ${MAX_RANGE_DAYS} days`;

const profitQuery = rangeQuery.refine(({ start, end }) => daysBetween(start, end) <= MAX_RANGE_DAYS, {
  message: spanMessage,
});

const computeRangeBody = z
  .object({ start_date: isoDate, end_date: isoDate })
  .refine(({ start_date, end_date }) => daysBetween(start_date, end_date) <= MAX_RANGE_DAYS, {
    message: spanMessage,
  });

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ValidationError(issues);
  }
  return result.data;
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }
  const message = err instanceof Error ? err.message : 'Internal error';
  console.error('[API] Unhandled error:', message);
  res.status(500).json({ error: message });
}

export function createAnalyticsRoutes(
  metricsService: MetricsService,
  aggregationJob: AggregationJob,
  stores: StoreLookup
): Router {
  const router = Router();

  async function resolveStore(rawId: string): Promise<Store> {
    const storeId = parse(storeIdSchema, rawId);
    const store = await stores.findById(storeId);
    if (!store) {
      throw new NotFoundError(`Store ${storeId} not found`);
    }
    return store;
  }

  // GET /stores/:storeId/analytics/daily?start=...&end=... — stored rows, inclusive range
  router.get('/stores/:storeId/analytics/daily', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const { start, end } = parse(rangeQuery, req.query);
      const data = await metricsService.getDailyAnalytics(store.id, start, end);
      res.json({ data });
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /stores/:storeId/analytics/summary?start=...&end=... — totals + daily rows
  router.get('/stores/:storeId/analytics/summary', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const { start, end } = parse(rangeQuery, req.query);
      const summary = await metricsService.getSummary(store.id, start, end);
      res.json(summary);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /stores/:storeId/analytics/series?start=...&end=...&granularity=weekly — bucketed time series
  router.get('/stores/:storeId/analytics/series', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const { start, end, granularity } = parse(seriesQuery, req.query);
      const data = await metricsService.getTimeSeries(store.id, start, end, granularity);
      res.json({ data });
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /stores/:storeId/analytics/profit?start=...&end=... — net profit breakdown
  router.get('/stores/:storeId/analytics/profit', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const { start, end } = parse(profitQuery, req.query);
      const report = await metricsService.getNetProfit(store.id, start, end);
      res.json(report);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /stores/:storeId/analytics/pnl?start=...&end=... — profit and loss statement
  router.get('/stores/:storeId/analytics/pnl', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const { start, end } = parse(profitQuery, req.query);
      const report = await metricsService.getProfitAndLoss(store.id, start, end);
      res.json(report);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /stores/:storeId/analytics/compute { date } — recompute one day
  router.post('/stores/:storeId/analytics/compute', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const { date } = parse(computeBody, req.body);
      const analytics = await aggregationJob.compute(store.id, date);
      res.json(analytics);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /stores/:storeId/analytics/compute-range { start_date, end_date } — recompute [start, end)
  router.post('/stores/:storeId/analytics/compute-range', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const { start_date, end_date } = parse(computeRangeBody, req.body);
      const report = await aggregationJob.computeRange(store.id, start_date, end_date);
      res.status(report.failures.length > 0 ? 207 : 200).json(report);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /stores/:storeId/analytics/backfill — recompute every day with orders
  router.post('/stores/:storeId/analytics/backfill', async (req: Request, res: Response) => {
    try {
      const store = await resolveStore(req.params.storeId);
      const report = await aggregationJob.computeAllForStore(store.id);
      res.status(report.failures.length > 0 ? 207 : 200).json(report);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
