/**
 * In-process counters exposed on the ops `/metrics` endpoint.
 */

export interface Metrics {
  bookings: {
    created: number;
    approved: number;
    rejected: number;
    cancelled: number;
    conflicts: number;
  };
  incidents: {
    reported: number;
    blocksApplied: number;
    blocksReleased: number;
    cascadeCancellations: number;
  };
  performance: {
    createTimes: number[]; // ms
    p95CreateTime?: number;
    avgCreateTime?: number;
  };
  locks: {
    acquisitions: number;
    contentions: number; // lock was already held on acquire
  };
  frames: {
    received: number;
    errors: number;
  };
  connections: {
    opened: number;
    closed: number;
  };
}

function emptyMetrics(): Metrics {
  return {
    bookings: { created: 0, approved: 0, rejected: 0, cancelled: 0, conflicts: 0 },
    incidents: { reported: 0, blocksApplied: 0, blocksReleased: 0, cascadeCancellations: 0 },
    performance: { createTimes: [] },
    locks: { acquisitions: 0, contentions: 0 },
    frames: { received: 0, errors: 0 },
    connections: { opened: 0, closed: 0 },
  };
}

class MetricsStore {
  private metrics: Metrics = emptyMetrics();

  private readonly MAX_CREATE_TIMES = 1000;

  incrementBookingCreated(): void {
    this.metrics.bookings.created++;
  }

  incrementBookingApproved(): void {
    this.metrics.bookings.approved++;
  }

  incrementBookingRejected(): void {
    this.metrics.bookings.rejected++;
  }

  incrementBookingCancelled(count = 1): void {
    this.metrics.bookings.cancelled += count;
  }

  incrementBookingConflict(): void {
    this.metrics.bookings.conflicts++;
  }

  incrementIncidentReported(): void {
    this.metrics.incidents.reported++;
  }

  recordBlockApplied(cancelledCount: number): void {
    this.metrics.incidents.blocksApplied++;
    this.metrics.incidents.cascadeCancellations += cancelledCount;
  }

  incrementBlockReleased(): void {
    this.metrics.incidents.blocksReleased++;
  }

  recordCreateTime(ms: number): void {
    const times = this.metrics.performance.createTimes;
    times.push(ms);
    if (times.length > this.MAX_CREATE_TIMES) {
      times.shift();
    }
  }

  incrementLockAcquisition(): void {
    this.metrics.locks.acquisitions++;
  }

  incrementLockContention(): void {
    this.metrics.locks.contentions++;
  }

  incrementFrameReceived(): void {
    this.metrics.frames.received++;
  }

  incrementFrameError(): void {
    this.metrics.frames.errors++;
  }

  incrementConnectionOpened(): void {
    this.metrics.connections.opened++;
  }

  incrementConnectionClosed(): void {
    this.metrics.connections.closed++;
  }

  private updatePerformanceStats(): void {
    const times = this.metrics.performance.createTimes;
    if (times.length === 0) return;

    const sum = times.reduce((a, b) => a + b, 0);
    this.metrics.performance.avgCreateTime = sum / times.length;

    const sorted = [...times].sort((a, b) => a - b);
    const p95Index = Math.min(sorted.length - 1, Math.floor(sorted.length * 0.95));
    this.metrics.performance.p95CreateTime = sorted[p95Index];
  }

  getMetrics(): Metrics {
    this.updatePerformanceStats();

    return {
      ...this.metrics,
      performance: {
        ...this.metrics.performance,
        // Stats only, not the raw samples
        createTimes: [],
      },
    };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }
}

export const metricsStore = new MetricsStore();
