// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

/**
 * Per-client Prometheus registry. Nothing is registered globally, so several
 * clients in one process keep separate series.
 */
export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP calls by final outcome',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP call duration including retries',
        labelNames: ['method', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_retries',
      new Counter({
        name: 'http_retries_total',
        help: 'Retried attempts',
        labelNames: ['reason'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'Failed HTTP calls by error kind',
        labelNames: ['kind'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'rate_limit_hits',
      new Counter({
        name: 'rate_limit_hits_total',
        help: 'HTTP 429 responses received',
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Calls waiting in the client-side request queue',
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number>): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
