import { QueueMetrics } from '../../src/metrics/metrics';

describe('QueueMetrics', () => {
  it('should start from zero', () => {
    const snapshot = new QueueMetrics().getSnapshot();

    expect(snapshot.itemsAdded).toBe(0);
    expect(snapshot.avgBlockedTime).toBe(0);
    expect(snapshot.p99BlockedTime).toBe(0);
  });

  it('should compute blocked-time statistics', () => {
    const metrics = new QueueMetrics();
    [10, 20, 30, 40].forEach(ms => metrics.recordBlockedTime(ms));

    const snapshot = metrics.getSnapshot();
    expect(snapshot.avgBlockedTime).toBe(25);
    expect(snapshot.maxBlockedTime).toBe(40);
    expect(snapshot.p50BlockedTime).toBe(20);
    expect(snapshot.p95BlockedTime).toBe(40);
  });

  it('should keep only the most recent samples for percentiles', () => {
    const metrics = new QueueMetrics(3);
    [1, 2, 3, 100].forEach(ms => metrics.recordBlockedTime(ms));

    const snapshot = metrics.getSnapshot();
    expect(snapshot.p50BlockedTime).toBe(3);
    expect(snapshot.avgBlockedTime).toBe(26.5);
    expect(snapshot.maxBlockedTime).toBe(100);
  });

  it('should track peak length', () => {
    const metrics = new QueueMetrics();
    metrics.updateQueueLength(5);
    metrics.updateQueueLength(2);

    const snapshot = metrics.getSnapshot();
    expect(snapshot.queueLength).toBe(2);
    expect(snapshot.peakLength).toBe(5);
  });

  it('should reset counters but keep the current length', () => {
    const metrics = new QueueMetrics();
    metrics.incrementItemsAdded();
    metrics.incrementTimeouts();
    metrics.addCancellations(3);
    metrics.recordBlockedTime(15);
    metrics.updateQueueLength(5);
    metrics.updateQueueLength(2);

    metrics.reset();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.itemsAdded).toBe(0);
    expect(snapshot.timeouts).toBe(0);
    expect(snapshot.cancellations).toBe(0);
    expect(snapshot.maxBlockedTime).toBe(0);
    expect(snapshot.queueLength).toBe(2);
    expect(snapshot.peakLength).toBe(2);
  });

  it('should render Prometheus text with a custom prefix', () => {
    const metrics = new QueueMetrics();
    metrics.incrementItemsRemoved();

    const lines = metrics.toPrometheusFormat('jobs').split('\n');

    expect(lines).toContain('# TYPE jobs_items_removed_total counter');
    expect(lines).toContain('jobs_items_removed_total 1');
    expect(lines).toContain('jobs_blocked_time_seconds{quantile="0.5"} 0');
  });
});
