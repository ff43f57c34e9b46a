import { performance } from 'node:perf_hooks';

type CounterMap = Record<string, number>;

type LatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type LatencyStats = LatencyState & {
  averageMs: number;
};

export type LogLevelMetrics = {
  byLevel: CounterMap;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

export type MetricsSnapshot = {
  createdAt: string;
  counters: CounterMap;
  latencies: Record<string, LatencyStats>;
  logs: LogLevelMetrics;
};

function mapFrom(map: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const [key, value] of Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b))) {
    result[key] = value;
  }
  return result;
}

class MetricsRegistry {
  private readonly counters = new Map<string, number>();
  private readonly latencyStats = new Map<string, LatencyState>();
  private readonly logLevelCounters = new Map<string, number>();
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;

  increment(counter: string, amount = 1) {
    this.counters.set(counter, (this.counters.get(counter) ?? 0) + amount);
  }

  getCounter(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  time<T>(metric: string, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencyStats.entries()) {
      latencies[metric] = {
        ...stats,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    return {
      createdAt: new Date().toISOString(),
      counters: mapFrom(this.counters),
      latencies,
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      }
    };
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
