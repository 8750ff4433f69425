import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Runtime } from '../runtime';
import { AggregationJob } from '../domains/analytics/aggregation.job';
import { InMemoryAnalyticsStore, InMemoryCommerce, InMemoryStores } from './fixtures';

describe('Runtime', () => {
  let job: AggregationJob;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    job = new AggregationJob(new InMemoryCommerce(), new InMemoryAnalyticsStore(), new InMemoryStores([]));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('runs the aggregation job on its interval until stopped', async () => {
    const run = vi.spyOn(job, 'run').mockResolvedValue(undefined);
    const runtime = new Runtime(job, 1_000);

    runtime.start();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(run).toHaveBeenCalledTimes(3);

    runtime.stop();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('logs a failed run and keeps the schedule', async () => {
    const run = vi.spyOn(job, 'run').mockRejectedValueOnce(new Error('db down')).mockResolvedValue(undefined);
    const runtime = new Runtime(job, 1_000);

    runtime.start();
    await vi.advanceTimersByTimeAsync(2_000);
    runtime.stop();

    expect(run).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenCalledWith('[Runtime] AggregationJob error:', 'db down');
  });

  it('runOnce awaits a single run', async () => {
    const run = vi.spyOn(job, 'run').mockResolvedValue(undefined);

    await new Runtime(job, 1_000).runOnce();

    expect(run).toHaveBeenCalledTimes(1);
  });
});
