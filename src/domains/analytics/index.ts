// ──────────────────────────────────────────
// Analytics domain — barrel export
// ──────────────────────────────────────────

export { DailySalesAnalyticsRepo } from './daily-sales.repo';
export { AggregationJob } from './aggregation.job';
export { MetricsService } from './metrics.service';
export { createAnalyticsRoutes } from './routes';
