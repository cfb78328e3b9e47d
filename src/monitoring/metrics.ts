// Prometheus-compatible metrics collection
// Tracks API requests, transaction outcomes, and unit-of-work latency

import type { MiddlewareHandler } from "hono";
import type { PostableTransactionType } from "../types";

type Labels = Record<string, string>;

export interface HistogramSummary {
  count: number;
  sum: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  timestamp: string;
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

export interface MetricsSummary {
  totalRequests: number;
  totalErrors: number;
  errorRate: number;
  totalTransactions: number;
  avgRequestDuration: number;
  p95RequestDuration: number;
  p99RequestDuration: number;
}

const MAX_HISTOGRAM_SAMPLES = 1000;

export class MetricsCollector {
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private labels: Map<string, Labels> = new Map();

  // Counter: monotonically increasing value
  incrementCounter(name: string, value: number = 1, labels?: Labels): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    if (labels) this.labels.set(key, labels);
  }

  // Gauge: value that can go up or down
  setGauge(name: string, value: number, labels?: Labels): void {
    const key = this.makeKey(name, labels);
    this.gauges.set(key, value);
    if (labels) this.labels.set(key, labels);
  }

  // Histogram: track distribution of values
  observe(name: string, value: number, labels?: Labels): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    if (values.length > MAX_HISTOGRAM_SAMPLES) {
      values.shift();
    }
    this.histograms.set(key, values);
    if (labels) this.labels.set(key, labels);
  }

  getCounter(name: string, labels?: Labels): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  private makeKey(name: string, labels?: Labels): string {
    if (!labels) return name;
    return `${name}{${formatLabels(labels)}}`;
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  }

  private summarize(values: number[]): HistogramSummary {
    const sum = values.reduce((a, b) => a + b, 0);
    return {
      count: values.length,
      sum,
      avg: values.length > 0 ? sum / values.length : 0,
      p50: this.percentile(values, 50),
      p95: this.percentile(values, 95),
      p99: this.percentile(values, 99),
      min: values.length > 0 ? Math.min(...values) : 0,
      max: values.length > 0 ? Math.max(...values) : 0,
    };
  }

  // Export metrics in Prometheus format
  exportPrometheus(): string {
    const lines: string[] = [];

    for (const [key, value] of this.counters.entries()) {
      lines.push(`# TYPE ${baseName(key)} counter`);
      lines.push(`${key} ${value}`);
    }

    for (const [key, value] of this.gauges.entries()) {
      lines.push(`# TYPE ${baseName(key)} gauge`);
      lines.push(`${key} ${value}`);
    }

    for (const [key, values] of this.histograms.entries()) {
      const name = baseName(key);
      const labels = this.labels.get(key);
      const labelStr = labels ? `{${formatLabels(labels)}}` : "";
      const summary = this.summarize(values);

      lines.push(`# TYPE ${name} histogram`);
      lines.push(`${name}_sum${labelStr} ${summary.sum}`);
      lines.push(`${name}_count${labelStr} ${summary.count}`);
      lines.push(`${name}_p50${labelStr} ${summary.p50}`);
      lines.push(`${name}_p95${labelStr} ${summary.p95}`);
      lines.push(`${name}_p99${labelStr} ${summary.p99}`);
    }

    return lines.join("\n") + "\n";
  }

  exportJSON(): MetricsSnapshot {
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, values] of this.histograms.entries()) {
      histograms[key] = this.summarize(values);
    }

    return {
      timestamp: new Date().toISOString(),
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
    };
  }

  getSummary(): MetricsSummary {
    let totalRequests = 0;
    let totalErrors = 0;
    let totalTransactions = 0;

    for (const [key, value] of this.counters.entries()) {
      if (key.startsWith("http_requests_total")) totalRequests += value;
      if (key.startsWith("http_errors_total")) totalErrors += value;
      if (key.startsWith("ledger_transactions_total")) totalTransactions += value;
    }

    const requestDurations: number[] = [];
    for (const [key, values] of this.histograms.entries()) {
      if (key.startsWith("http_request_duration_ms")) {
        requestDurations.push(...values);
      }
    }

    const avgRequestDuration =
      requestDurations.length > 0
        ? requestDurations.reduce((a, b) => a + b, 0) / requestDurations.length
        : 0;

    return {
      totalRequests,
      totalErrors,
      errorRate: totalRequests > 0 ? (totalErrors / totalRequests) * 100 : 0,
      totalTransactions,
      avgRequestDuration: Math.round(avgRequestDuration * 100) / 100,
      p95RequestDuration: this.percentile(requestDurations, 95),
      p99RequestDuration: this.percentile(requestDurations, 99),
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.labels.clear();
  }
}

function baseName(key: string): string {
  return key.split("{")[0] ?? key;
}

function formatLabels(labels: Labels): string {
  return Object.entries(labels)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
}

// Singleton instance
export const metrics = new MetricsCollector();

export type TransactionOutcome = "completed" | "replayed" | "rejected" | "failed";

export function trackRequest(
  method: string,
  path: string,
  status: number,
  duration: number,
): void {
  const labels = { method, path, status: status.toString() };
  metrics.incrementCounter("http_requests_total", 1, labels);
  metrics.observe("http_request_duration_ms", duration, { method, path });

  if (status >= 400) {
    metrics.incrementCounter("http_errors_total", 1, labels);
  }
}

export function trackTransaction(
  type: PostableTransactionType,
  outcome: TransactionOutcome,
): void {
  metrics.incrementCounter("ledger_transactions_total", 1, { type, outcome });
}

export function trackUnitOfWork(duration: number): void {
  metrics.observe("ledger_unit_of_work_duration_ms", duration);
}

// Middleware to track HTTP requests. Uses the matched route pattern so
// per-user paths do not explode the label space.
export function metricsMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now();

    await next();

    trackRequest(
      c.req.method,
      c.req.routePath,
      c.res.status,
      performance.now() - start,
    );
  };
}
