import { Injectable } from '@nestjs/common';
import { Counter, Histogram, Gauge, register } from 'prom-client';

/**
 * Prometheus metrics for qualification runs and the historical lookup.
 * Registered on the default registry, which `/metrics` exposes.
 */
@Injectable()
export class MetricsService {
  // Runs
  private readonly runsCounter: Counter;
  private readonly runsDeduplicatedCounter: Counter;
  private readonly runsQueuedCounter: Counter;
  private readonly runDuration: Histogram;
  private readonly rowsCounter: Counter;
  private readonly rowFailuresCounter: Counter;
  private readonly historicalMatchesCounter: Counter;
  private readonly staleRunsCounter: Counter;
  private readonly queueDepthGauge: Gauge;

  // Historical lookup
  private readonly lookupRebuildCounter: Counter;
  private readonly lookupEntriesGauge: Gauge;
  private readonly lookupCacheCounter: Counter;

  constructor() {
    this.runsCounter = new Counter({
      name: 'qualification_runs_total',
      help: 'Total number of finished qualification runs',
      labelNames: ['status', 'context'],
    });

    this.runsDeduplicatedCounter = new Counter({
      name: 'qualification_runs_deduplicated_total',
      help: 'Runs short-circuited because identical input was already processed',
    });

    this.runsQueuedCounter = new Counter({
      name: 'qualification_runs_queued_total',
      help: 'Run requests published to the queue',
    });

    this.runDuration = new Histogram({
      name: 'qualification_run_duration_seconds',
      help: 'Duration of qualification runs',
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
    });

    this.rowsCounter = new Counter({
      name: 'qualification_rows_total',
      help: 'Standing rows handled by runs',
      labelNames: ['outcome'],
    });

    this.rowFailuresCounter = new Counter({
      name: 'qualification_row_failures_total',
      help: 'Standing rows rejected by runs',
      labelNames: ['reason'],
    });

    this.historicalMatchesCounter = new Counter({
      name: 'qualification_historical_matches_total',
      help: 'Historical lookup results by level',
      labelNames: ['level'],
    });

    this.staleRunsCounter = new Counter({
      name: 'qualification_stale_runs_reconciled_total',
      help: 'Runs stuck in running that were marked failed',
    });

    this.queueDepthGauge = new Gauge({
      name: 'qualification_queue_depth',
      help: 'Current number of messages in the run queue',
    });

    this.lookupRebuildCounter = new Counter({
      name: 'historical_lookup_rebuilds_total',
      help: 'Historical lookup rebuilds',
      labelNames: ['status'],
    });

    this.lookupEntriesGauge = new Gauge({
      name: 'historical_lookup_entries',
      help: 'Entries in the historical lookup table',
      labelNames: ['level'],
    });

    this.lookupCacheCounter = new Counter({
      name: 'historical_lookup_cache_total',
      help: 'Historical lookup loads by source',
      labelNames: ['result'],
    });
  }

  recordRun(status: string, context: string, durationSeconds: number): void {
    this.runsCounter.inc({ status, context });
    this.runDuration.observe(durationSeconds);
  }

  incrementRunsDeduplicated(): void {
    this.runsDeduplicatedCounter.inc();
  }

  incrementRunsQueued(): void {
    this.runsQueuedCounter.inc();
  }

  recordRows(materialized: number, failed: number): void {
    if (materialized > 0) this.rowsCounter.inc({ outcome: 'materialized' }, materialized);
    if (failed > 0) this.rowsCounter.inc({ outcome: 'failed' }, failed);
  }

  incrementRowFailure(reason: string): void {
    this.rowFailuresCounter.inc({ reason });
  }

  incrementHistoricalMatch(level: string): void {
    this.historicalMatchesCounter.inc({ level });
  }

  incrementStaleRunsReconciled(count: number): void {
    this.staleRunsCounter.inc(count);
  }

  setQueueDepth(depth: number): void {
    this.queueDepthGauge.set(depth);
  }

  recordLookupRebuild(status: 'success' | 'failure'): void {
    this.lookupRebuildCounter.inc({ status });
  }

  setLookupEntries(rankEntries: number, bucketEntries: number): void {
    this.lookupEntriesGauge.set({ level: 'rank' }, rankEntries);
    this.lookupEntriesGauge.set({ level: 'bucket' }, bucketEntries);
  }

  incrementLookupCache(result: 'hit' | 'miss' | 'error'): void {
    this.lookupCacheCounter.inc({ result });
  }

  async getMetrics(): Promise<string> {
    return await register.metrics();
  }
}
