import type { RunSummary } from '../pipeline/orchestrator.js';

const LATENCY_BUCKETS_MS = [50, 100, 250, 500, 1000, 2000, 5000, 10000];
const RUN_DURATION_BUCKETS_MS = [10_000, 30_000, 60_000, 120_000, 300_000, 600_000];

// ─── Histogram ───────────────────────────────────────────────────────

class Histogram {
  private count = 0;
  private sum = 0;
  private readonly counts: number[];

  constructor(private readonly buckets: readonly number[]) {
    this.counts = new Array<number>(buckets.length + 1).fill(0);
  }

  observe(value: number): void {
    this.count += 1;
    this.sum += value;
    const idx = this.buckets.findIndex((limit) => value <= limit);
    this.counts[idx >= 0 ? idx : this.buckets.length] += 1;
  }

  /** Upper bound of the bucket holding the p-th percentile. */
  percentile(p: number): number {
    if (this.count === 0) return 0;
    const target = Math.max(1, Math.ceil(this.count * p));
    let running = 0;
    for (let i = 0; i < this.counts.length; i++) {
      running += this.counts[i];
      if (running >= target) return this.buckets[Math.min(i, this.buckets.length - 1)];
    }
    return this.buckets[this.buckets.length - 1];
  }

  snapshot() {
    return {
      count: this.count,
      avg_ms: this.count > 0 ? Math.round((this.sum / this.count) * 100) / 100 : 0,
      p50_ms_upper_bound: this.percentile(0.5),
      p95_ms_upper_bound: this.percentile(0.95),
      buckets_ms: [...this.buckets],
      histogram: [...this.counts],
    };
  }

  reset(): void {
    this.count = 0;
    this.sum = 0;
    this.counts.fill(0);
  }
}

// ─── HTTP ────────────────────────────────────────────────────────────

const emptyHttpCounters = () => ({ total: 0, status_2xx: 0, status_4xx: 0, status_5xx: 0 });
const httpCounters = emptyHttpCounters();
const httpLatency = new Histogram(LATENCY_BUCKETS_MS);

export function recordRequestMetric(status: number, latencyMs: number): void {
  httpCounters.total += 1;
  if (status >= 500) httpCounters.status_5xx += 1;
  else if (status >= 400) httpCounters.status_4xx += 1;
  else if (status >= 200 && status < 300) httpCounters.status_2xx += 1;
  httpLatency.observe(latencyMs);
}

// ─── Runs ────────────────────────────────────────────────────────────

const emptyRunCounters = () => ({
  started: 0,
  completed: 0,
  timed_out: 0,
  abandoned: 0,
  batches_succeeded: 0,
  batches_partial: 0,
  batches_failed: 0,
  results: 0,
});
const runCounters = emptyRunCounters();
let activeRuns = 0;
const runDuration = new Histogram(RUN_DURATION_BUCKETS_MS);

export function recordRunStarted(): void {
  runCounters.started += 1;
  activeRuns += 1;
}

export function recordRunFinished(summary: RunSummary): void {
  activeRuns = Math.max(0, activeRuns - 1);
  if (summary.terminal === 'complete') runCounters.completed += 1;
  else if (summary.terminal === 'timeout') runCounters.timed_out += 1;
  else runCounters.abandoned += 1;
  runCounters.batches_succeeded += summary.succeeded;
  runCounters.batches_partial += summary.partial;
  runCounters.batches_failed += summary.failed;
  runCounters.results += summary.result_count;
  runDuration.observe(summary.duration_ms);
}

export function getMetrics() {
  return {
    http: { counters: { ...httpCounters }, latency: httpLatency.snapshot() },
    runs: { active: activeRuns, counters: { ...runCounters }, duration: runDuration.snapshot() },
  };
}

export function resetMetricsForTest(): void {
  Object.assign(httpCounters, emptyHttpCounters());
  Object.assign(runCounters, emptyRunCounters());
  activeRuns = 0;
  httpLatency.reset();
  runDuration.reset();
}
