/**
 * Prometheus metrics middleware + collector.
 *
 * Counters are kept per family and label set; request durations go into
 * one histogram. Everything is written through the shared exposition
 * helpers, after the portfolio gauges.
 *
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path}
 * - portfolio_updates_total{result} (incremented by the valuator)
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { renderFamilies, seriesKey, sortedLabels } from "../services/exposition.js";
import type { Labels, MetricFamily, Sample } from "../services/exposition.js";

export const HTTP_REQUESTS_COUNTER = "http_requests_total";
export const HTTP_DURATION_HISTOGRAM = "http_request_duration_seconds";

/** Path label for requests that matched no route. */
export const UNMATCHED_PATH = "unmatched";

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

interface CounterSeries {
  readonly labels: Labels;
  count: number;
}

interface CounterFamily {
  readonly help: string;
  readonly series: Map<string, CounterSeries>;
}

interface DurationSeries {
  readonly labels: Labels;
  sum: number;
  count: number;
  /** Cumulative count per bucket, aligned with the collector's bounds. */
  readonly bucketCounts: number[];
}

// =============================================================================
// Metrics Collector
// =============================================================================

export class MetricsCollector {
  private readonly _counters = new Map<string, CounterFamily>();
  private readonly _durations = new Map<string, DurationSeries>();
  private readonly _buckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = buckets;
  }

  recordRequest(
    method: string,
    path: string,
    status: number,
    durationMs: number,
  ): void {
    this.incrementCounter(
      HTTP_REQUESTS_COUNTER,
      { method, path, status: String(status) },
      "Total HTTP requests",
    );
    this.observeDuration({ method, path }, durationMs / 1000);
  }

  /**
   * Increment a counter series. The help text of the first increment sticks.
   */
  incrementCounter(name: string, labels: Labels = {}, help: string = "Counter"): void {
    let family = this._counters.get(name);
    if (family === undefined) {
      family = { help, series: new Map() };
      this._counters.set(name, family);
    }

    const key = seriesKey(labels);
    const series = family.series.get(key);
    if (series !== undefined) {
      series.count++;
    } else {
      family.series.set(key, { labels: sortedLabels(labels), count: 1 });
    }
  }

  /** Current value of a counter series, 0 when never incremented. */
  counterValue(name: string, labels: Labels = {}): number {
    return this._counters.get(name)?.series.get(seriesKey(labels))?.count ?? 0;
  }

  render(): string {
    const families: MetricFamily[] = [];
    for (const [name, family] of this._counters) {
      families.push({
        name,
        help: family.help,
        type: "counter",
        samples: [...family.series.values()].map(({ labels, count }) => ({
          labels,
          value: count,
        })),
      });
    }
    if (this._durations.size > 0) {
      families.push({
        name: HTTP_DURATION_HISTOGRAM,
        help: "HTTP request duration in seconds",
        type: "histogram",
        samples: [...this._durations.values()].flatMap((series) =>
          this.histogramSamples(series),
        ),
      });
    }
    return renderFamilies(families);
  }

  private observeDuration(labels: Labels, seconds: number): void {
    const key = seriesKey(labels);
    let series = this._durations.get(key);
    if (series === undefined) {
      series = {
        labels: sortedLabels(labels),
        sum: 0,
        count: 0,
        bucketCounts: this._buckets.map(() => 0),
      };
      this._durations.set(key, series);
    }
    series.sum += seconds;
    series.count++;
    for (let i = 0; i < this._buckets.length; i++) {
      const le = this._buckets[i];
      if (le !== undefined && seconds <= le) {
        series.bucketCounts[i] = (series.bucketCounts[i] ?? 0) + 1;
      }
    }
  }

  private histogramSamples(series: DurationSeries): Sample[] {
    const buckets = this._buckets.map((le, i) => ({
      suffix: "_bucket",
      labels: { ...series.labels, le: String(le) },
      value: series.bucketCounts[i] ?? 0,
    }));
    return [
      ...buckets,
      { suffix: "_bucket", labels: { ...series.labels, le: "+Inf" }, value: series.count },
      { suffix: "_sum", labels: series.labels, value: series.sum },
      { suffix: "_count", labels: series.labels, value: series.count },
    ];
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Record method, path, status and duration for every request. Requests
 * that hit no route share one path label.
 */
export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    const path = c.res.status === 404 ? UNMATCHED_PATH : c.req.path;
    collector.recordRequest(c.req.method, path, c.res.status, durationMs);
  };
}
