import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { monotonicClock } from '../bus/localBus.js';
import type { RateAggregator } from './aggregator.js';
import type { AggregateSnapshot, Clock, MonitoredName } from '../types.js';

export const NEVER_SEEN = 'Never';

export type DashboardRow = {
  name: MonitoredName;
  count: number;
  /** Messages per second since the session started. */
  rate: number;
  lastSeen: string;
};

export type DashboardFrame = {
  title: string;
  elapsedSeconds: number;
  rows: DashboardRow[];
  /** Set while nothing monitored has arrived yet. */
  waitingFor: readonly MonitoredName[] | null;
};

export interface RenderSink {
  render(frame: DashboardFrame): void;
}

export function computeRate(count: number, elapsedSeconds: number): number {
  return elapsedSeconds > 0 ? count / elapsedSeconds : 0;
}

export function formatRate(rate: number): string {
  return rate.toFixed(2);
}

export function formatRecency(lastSeen: number | null, now: number): string {
  if (lastSeen === null) {
    return NEVER_SEEN;
  }
  const deltaMs = Math.max(0, Math.floor(now - lastSeen));
  if (deltaMs < 1000) {
    return `${deltaMs} ms ago`;
  }
  return `${Math.floor(deltaMs / 1000)} s ago`;
}

export type BuildFrameInput = {
  snapshot: AggregateSnapshot;
  monitored: readonly MonitoredName[];
  startTime: number;
  now: number;
  title: string;
};

export function buildFrame(input: BuildFrameInput): DashboardFrame {
  const elapsedSeconds = Math.max(0, Math.floor((input.now - input.startTime) / 1000));
  const rows = input.monitored.map(name => {
    const entry = input.snapshot.get(name);
    const count = entry?.count ?? 0;
    return {
      name,
      count,
      rate: computeRate(count, elapsedSeconds),
      lastSeen: formatRecency(entry?.lastSeen ?? null, input.now)
    };
  });

  return {
    title: input.title,
    elapsedSeconds,
    rows,
    waitingFor: input.snapshot.size === 0 ? input.monitored : null
  };
}

export type DashboardRendererOptions = {
  aggregator: RateAggregator;
  monitored: readonly MonitoredName[];
  startTime: number;
  sink: RenderSink;
  title: string;
  intervalMs?: number;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

/** Redraws the whole table from a fresh snapshot on every tick. */
export class DashboardRenderer {
  private readonly options: DashboardRendererOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private abortListener: { signal: AbortSignal; listener: () => void } | null = null;

  constructor(options: DashboardRendererOptions) {
    this.options = options;
    this.clock = options.clock ?? monotonicClock;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.intervalMs = options.intervalMs ?? 1000;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  tick(): DashboardFrame {
    return this.metrics.time('renderer.tick.ms', () => {
      const frame = buildFrame({
        snapshot: this.options.aggregator.snapshot(),
        monitored: this.options.monitored,
        startTime: this.options.startTime,
        now: this.clock.now(),
        title: this.options.title
      });
      this.options.sink.render(frame);
      this.metrics.increment('renderer.ticks');
      return frame;
    });
  }

  start(signal?: AbortSignal): void {
    if (this.timer || signal?.aborted) {
      return;
    }

    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        this.logger.error({ err: error }, 'Dashboard render failed');
      }
    }, this.intervalMs);

    if (signal) {
      const listener = () => this.stop();
      signal.addEventListener('abort', listener, { once: true });
      this.abortListener = { signal, listener };
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.abortListener) {
      this.abortListener.signal.removeEventListener('abort', this.abortListener.listener);
      this.abortListener = null;
    }
  }
}
