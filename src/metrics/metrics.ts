export interface QueueMetricsSnapshot {
  itemsAdded: number;
  itemsRemoved: number;
  handOffs: number;
  timeouts: number;
  cancellations: number;

  blockedProducers: number;
  blockedConsumers: number;

  queueLength: number;
  peakLength: number;

  avgBlockedTime: number;
  maxBlockedTime: number;

  p50BlockedTime?: number;
  p95BlockedTime?: number;
  p99BlockedTime?: number;

  uptimeMs: number;
}

export class QueueMetrics {
  private itemsAdded: number = 0
  private itemsRemoved: number = 0
  private handOffs: number = 0
  private timeouts: number = 0
  private cancellations: number = 0

  private blockedProducers: number = 0
  private blockedConsumers: number = 0

  private queueLength: number = 0
  private peakLength: number = 0

  private readonly maxSamples: number;
  // Ring buffer of the most recent blocked-time samples
  private blockedTimes: number[] = []
  private blockedTimeIndex: number = 0;

  private totalBlockedTime: number = 0;
  private blockedCount: number = 0;
  private maxBlockedTime: number = 0;

  private startTime: number = Date.now();

  constructor(maxSamples: number = 1000) {
    this.maxSamples = maxSamples;
  }

  incrementItemsAdded(): void {
    this.itemsAdded++
  }

  incrementItemsRemoved(): void {
    this.itemsRemoved++
  }

  incrementHandOffs(): void {
    this.handOffs++
  }

  incrementTimeouts(): void {
    this.timeouts++
  }

  addCancellations(count: number): void {
    this.cancellations += count
  }

  incrementBlockedProducers(): void {
    this.blockedProducers++
  }

  incrementBlockedConsumers(): void {
    this.blockedConsumers++
  }

  updateQueueLength(length: number): void {
    this.queueLength = length
    if (length > this.peakLength) this.peakLength = length
  }

  recordBlockedTime(durationMs: number): void {
    if (this.blockedTimes.length < this.maxSamples) {
      this.blockedTimes.push(durationMs)
    } else {
      this.blockedTimes[this.blockedTimeIndex] = durationMs
    }
    this.blockedTimeIndex = (this.blockedTimeIndex + 1) % this.maxSamples

    this.totalBlockedTime += durationMs
    this.blockedCount++
    if (durationMs > this.maxBlockedTime) this.maxBlockedTime = durationMs
  }

  calculatePercentile(percentile: number): number {
    if (this.blockedTimes.length === 0) return 0;

    const sorted = [...this.blockedTimes].sort((a, b) => a - b);
    const index = Math.ceil((percentile / 100) * sorted.length) - 1;
    return sorted[Math.max(index, 0)];
  }

  getSnapshot(): QueueMetricsSnapshot {
    return {
      itemsAdded: this.itemsAdded,
      itemsRemoved: this.itemsRemoved,
      handOffs: this.handOffs,
      timeouts: this.timeouts,
      cancellations: this.cancellations,

      blockedProducers: this.blockedProducers,
      blockedConsumers: this.blockedConsumers,

      queueLength: this.queueLength,
      peakLength: this.peakLength,

      avgBlockedTime: this.blockedCount > 0 ? this.totalBlockedTime / this.blockedCount : 0,
      maxBlockedTime: this.maxBlockedTime,

      p50BlockedTime: this.calculatePercentile(50),
      p95BlockedTime: this.calculatePercentile(95),
      p99BlockedTime: this.calculatePercentile(99),

      uptimeMs: Date.now() - this.startTime
    }
  }

  reset(): void {
    this.itemsAdded = 0
    this.itemsRemoved = 0
    this.handOffs = 0
    this.timeouts = 0
    this.cancellations = 0

    this.blockedProducers = 0
    this.blockedConsumers = 0

    // queueLength is a gauge and survives a reset
    this.peakLength = this.queueLength

    this.blockedTimes = []
    this.blockedTimeIndex = 0;

    this.totalBlockedTime = 0;
    this.blockedCount = 0;
    this.maxBlockedTime = 0;

    this.startTime = Date.now();
  }

  toPrometheusFormat(prefix: string = 'awaitq'): string {
    const snapshot = this.getSnapshot();
    return [
      `# HELP ${prefix}_items_added_total Total items added to the queue`,
      `# TYPE ${prefix}_items_added_total counter`,
      `${prefix}_items_added_total ${snapshot.itemsAdded}`,
      `# HELP ${prefix}_items_removed_total Total items taken from the queue`,
      `# TYPE ${prefix}_items_removed_total counter`,
      `${prefix}_items_removed_total ${snapshot.itemsRemoved}`,
      `# HELP ${prefix}_timeouts_total Total add/take operations that timed out`,
      `# TYPE ${prefix}_timeouts_total counter`,
      `${prefix}_timeouts_total ${snapshot.timeouts}`,
      `# HELP ${prefix}_cancellations_total Total pending operations aborted by clear or close`,
      `# TYPE ${prefix}_cancellations_total counter`,
      `${prefix}_cancellations_total ${snapshot.cancellations}`,
      `# HELP ${prefix}_queue_length Current number of buffered items`,
      `# TYPE ${prefix}_queue_length gauge`,
      `${prefix}_queue_length ${snapshot.queueLength}`,
      `# HELP ${prefix}_blocked_time_seconds Time callers spent suspended`,
      `# TYPE ${prefix}_blocked_time_seconds summary`,
      `${prefix}_blocked_time_seconds{quantile="0.5"} ${(snapshot.p50BlockedTime ?? 0) / 1000}`,
      `${prefix}_blocked_time_seconds{quantile="0.95"} ${(snapshot.p95BlockedTime ?? 0) / 1000}`,
      `${prefix}_blocked_time_seconds{quantile="0.99"} ${(snapshot.p99BlockedTime ?? 0) / 1000}`,
    ].join('\n');
  }
}

export default QueueMetrics;
