/**
 * MetricsCollector Unit Tests
 *
 * Per-client registry contents and the disabled mode.
 */

import { describe, it, expect } from 'vitest';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

describe('MetricsCollector', () => {
  it('should count requests by method and status', async () => {
    const metrics = new MetricsCollector();

    metrics.incrementCounter('http_requests_total', { method: 'GET', status: 200 });
    metrics.incrementCounter('http_requests_total', { method: 'GET', status: 200 });
    metrics.incrementCounter('http_requests_total', { method: 'POST', status: 400 });

    const output = await metrics.getMetrics();
    expect(output).toContain('http_requests_total{method="GET",status="200"} 2');
    expect(output).toContain('http_requests_total{method="POST",status="400"} 1');
  });

  it('should record latency in seconds', async () => {
    const metrics = new MetricsCollector();

    metrics.recordLatency('http_request_duration', 250, { method: 'GET', status: 200 });

    const output = await metrics.getMetrics();
    expect(output).toContain('http_request_duration_seconds_sum{method="GET",status="200"} 0.25');
    expect(output).toContain('http_request_duration_seconds_count{method="GET",status="200"} 1');
  });

  it('should record the queue gauge', async () => {
    const metrics = new MetricsCollector();

    metrics.recordGauge('rate_limit_queue_size', 3, {});

    expect(await metrics.getMetrics()).toContain('rate_limit_queue_size 3');
  });

  it('should ignore unknown metric names', async () => {
    const metrics = new MetricsCollector();

    metrics.incrementCounter('unknown_metric', {});

    expect(await metrics.getMetrics()).not.toContain('unknown_metric');
  });

  it('should keep registries separate per instance', async () => {
    const first = new MetricsCollector();
    const second = new MetricsCollector();

    first.incrementCounter('http_errors', { kind: 'TransportError' });

    expect(await first.getMetrics()).toContain('http_errors_total{kind="TransportError"} 1');
    expect(await second.getMetrics()).not.toContain('kind="TransportError"');
  });

  it('should register nothing when disabled', async () => {
    const metrics = new MetricsCollector({ enabled: false });

    metrics.incrementCounter('http_requests_total', { method: 'GET', status: 200 });

    expect(await metrics.getMetrics()).not.toContain('http_requests_total');
  });
});
