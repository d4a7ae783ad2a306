import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSummary {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, HistogramSummary>;
  /** Counters recorded against a dataset, keyed by dataset name. */
  datasets: Record<string, Record<string, number>>;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly datasetCounters = new Map<string, Map<MetricCounterName, number>>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  /** Adds to the run total and, when a dataset is given, to that dataset's share. */
  incrementCounter(name: MetricCounterName, value = 1, dataset?: string): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
    if (dataset !== undefined) {
      const perDataset = this.datasetCounters.get(dataset) ?? new Map<MetricCounterName, number>();
      perDataset.set(name, (perDataset.get(name) ?? 0) + value);
      this.datasetCounters.set(dataset, perDataset);
    }
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

  getCounter(name: MetricCounterName, dataset?: string): number {
    const source = dataset === undefined ? this.counters : this.datasetCounters.get(dataset);
    return source?.get(name) ?? 0;
  }

  getSummary(): MetricsSummary {
    const datasets: MetricsSummary["datasets"] = {};
    for (const [dataset, values] of [...this.datasetCounters.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      datasets[dataset] = Object.fromEntries(values);
    }
    return {
      counters: {
        downloads_ok: this.getCounter("downloads_ok"),
        downloads_failed: this.getCounter("downloads_failed"),
        downloads_skipped: this.getCounter("downloads_skipped"),
        extracts_ok: this.getCounter("extracts_ok"),
        extracts_failed: this.getCounter("extracts_failed"),
        rows_written: this.getCounter("rows_written"),
      },
      timers: {
        download_ms: this.summarize("download_ms"),
        extract_ms: this.summarize("extract_ms"),
      },
      datasets,
    };
  }

  printSummary(): void {
    console.log(JSON.stringify({ ts: new Date().toISOString(), level: "info", msg: "metrics_summary", ...this.getSummary() }, null, 2));
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
