// ──────────────────────────────────────────
// Runtime: Background job scheduler
// ──────────────────────────────────────────

import { AggregationJob } from './domains/analytics/aggregation.job';
import { errorMessage } from './shared/errors';

export class Runtime {
  private intervals: NodeJS.Timeout[] = [];

  constructor(
    private aggregationJob: AggregationJob,
    private aggregationIntervalMs: number
  ) {}

  start(): void {
    this.intervals.push(
      setInterval(() => {
        this.aggregationJob.run().catch((err: unknown) =>
          console.error('[Runtime] AggregationJob error:', errorMessage(err))
        );
      }, this.aggregationIntervalMs)
    );

    console.log(`[Runtime] Started background jobs (aggregate: ${this.aggregationIntervalMs / 1000}s)`);
  }

  stop(): void {
    this.intervals.forEach(clearInterval);
    this.intervals = [];
    console.log('[Runtime] Stopped background jobs');
  }

  async runOnce(): Promise<void> {
    console.log('[Runtime] Running all jobs once...');
    await this.aggregationJob.run();
    console.log('[Runtime] Completed single run');
  }
}
