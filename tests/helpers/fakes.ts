import { EventEmitter } from 'node:events';
import { Writable } from 'node:stream';
import { LocalMessageBus } from '../../src/bus/localBus.js';
import type { MonitorConfig } from '../../src/config/index.js';
import { createLogger } from '../../src/logger.js';
import type { Transport } from '../../src/connection/transport.js';
import { MetricsRegistry } from '../../src/metrics/index.js';
import type { DashboardFrame, RenderSink } from '../../src/monitor/renderer.js';
import type { Clock, DeviceConnection, DeviceSystem } from '../../src/types.js';

export class ManualClock implements Clock {
  current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(value: number) {
    this.current = value;
  }

  advance(ms: number) {
    this.current += ms;
  }
}

/** Sleep that only moves the manual clock. */
export function clockSleep(clock: ManualClock, onSleep?: (ms: number) => void) {
  return async (ms: number) => {
    clock.advance(ms);
    onSleep?.(ms);
  };
}

export class FakeConnection extends LocalMessageBus implements DeviceConnection {
  readonly discovered: DeviceSystem[] = [];
  closeCalls = 0;

  constructor(clock: Clock) {
    super({ clock, metrics: new MetricsRegistry() });
  }

  systems(): DeviceSystem[] {
    return [...this.discovered];
  }

  addSystem(systemId = 1, componentId = 1) {
    this.discovered.push({ systemId, componentId, discoveredAt: 0 });
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

export class FakeTransport extends EventEmitter implements Transport {
  readonly description = 'fake://device';
  readonly sent: Buffer[] = [];
  closed = false;

  localAddress(): null {
    return null;
  }

  send(chunk: Buffer): void {
    this.sent.push(chunk);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  feed(chunk: Uint8Array) {
    this.emit('data', Buffer.from(chunk));
  }
}

export class CollectingSink implements RenderSink {
  readonly frames: DashboardFrame[] = [];

  render(frame: DashboardFrame): void {
    this.frames.push(frame);
  }

  get last(): DashboardFrame | undefined {
    return this.frames[this.frames.length - 1];
  }
}

export function createOutput() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
      callback();
    }
  });
  return {
    stream,
    text: () => chunks.join(''),
    lines: () => chunks.join('').split('\n')
  };
}

/** Logger at info whose JSON lines are kept in memory. */
export function captureLogs() {
  const lines: string[] = [];
  const destination = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
      callback();
    }
  });
  const logger = createLogger({ level: 'info', destination });
  return {
    logger,
    records: (): unknown[] => lines.map(line => JSON.parse(line))
  };
}

export function buildConfig(overrides: Partial<MonitorConfig['readiness']> = {}): MonitorConfig {
  return {
    app: { name: 'sensor-rate-monitor', title: 'Sensor Message Rate Monitor' },
    logging: { level: 'silent' },
    monitor: {
      messages: ['OPTICAL_FLOW', 'OPTICAL_FLOW_RAD', 'DISTANCE_SENSOR', 'HEARTBEAT'],
      refreshIntervalMs: 1000,
      display: 'terminal'
    },
    readiness: {
      pollIntervalMs: 100,
      timeoutMs: 10_000,
      graceMs: 2_000,
      failWithoutSystem: true,
      ...overrides
    },
    connection: {
      systemId: 245,
      componentId: 190,
      heartbeatIntervalMs: 1000,
      verifyChecksums: true
    }
  };
}

export type UnhandledCapture = {
  reasons: unknown[];
  restore: () => void;
};

export function captureUnhandledRejections(): UnhandledCapture {
  const reasons: unknown[] = [];
  const listener = (reason: unknown) => {
    reasons.push(reason);
  };

  process.on('unhandledRejection', listener);

  return {
    reasons,
    restore() {
      process.off('unhandledRejection', listener);
    }
  };
}
