import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
  p95: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      candidates_loaded: this.count("candidates_loaded"),
      candidates_dropped: this.count("candidates_dropped"),
      candidates_skipped: this.count("candidates_skipped"),
      candidates_rejected: this.count("candidates_rejected"),
      requests_sent: this.count("requests_sent"),
      request_retries: this.count("request_retries"),
      verification_failed: this.count("verification_failed"),
      archives_ok: this.count("archives_ok"),
      archives_failed: this.count("archives_failed"),
      archives_cancelled: this.count("archives_cancelled"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      request_ms: this.summarize("request_ms"),
      verify_ms: this.summarize("verify_ms"),
      candidate_ms: this.summarize("candidate_ms"),
    };
  }

  printSummary(output: (line: string) => void = console.log): void {
    output(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }

  private count(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = [...(this.timers.get(name) ?? [])].sort((a, b) => a - b);
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0, p95: 0 };
    }

    const total = values.reduce((sum, value) => sum + value, 0);
    // nearest-rank percentile
    const p95 = values[Math.min(values.length - 1, Math.ceil(values.length * 0.95) - 1)];
    return {
      count: values.length,
      min: values[0],
      max: values[values.length - 1],
      avg: Number((total / values.length).toFixed(2)),
      p95,
    };
  }
}
