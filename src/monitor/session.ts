import { EventEmitter } from 'node:events';
import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { monotonicClock } from '../bus/localBus.js';
import { ConnectionError, MonitorError, NoDeviceDetectedError } from '../errors.js';
import { Channel } from '../utils/channel.js';
import type { ReadinessConfig } from '../config/index.js';
import { RateAggregator } from './aggregator.js';
import { DashboardRenderer, type RenderSink } from './renderer.js';
import { Subscriber } from './subscriber.js';
import type {
  AggregateSnapshot,
  Clock,
  DeviceConnection,
  MessageEvent,
  MonitoredName
} from '../types.js';

export type SessionState = 'idle' | 'connecting' | 'waiting-for-system' | 'monitoring' | 'stopped';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type SessionOptions = {
  url: string;
  connect: (url: string) => Promise<DeviceConnection>;
  monitored: readonly MonitoredName[];
  readiness: ReadinessConfig;
  refreshIntervalMs: number;
  title: string;
  sink: RenderSink;
  /** Operator-facing status lines. */
  out?: NodeJS.WritableStream;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type SessionSummary = {
  recorded: number;
  snapshot: AggregateSnapshot;
  headless: boolean;
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const delay: Sleep = (ms, signal) =>
  new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener('abort', finish, { once: true });
  });

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise(resolve => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * connecting → waiting-for-system → monitoring → stopped.
 *
 * Monitoring lasts until the signal passed to {@link MonitorSession.run}
 * aborts; teardown then unsubscribes, drains the update loop and closes the
 * connection before `run` resolves.
 */
export class MonitorSession extends EventEmitter {
  private readonly options: SessionOptions;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly out: NodeJS.WritableStream | null;
  private readonly aggregator = new RateAggregator();
  private currentState: SessionState = 'idle';
  private startTime: number | null = null;

  constructor(options: SessionOptions) {
    super();
    this.options = options;
    this.clock = options.clock ?? monotonicClock;
    this.sleep = options.sleep ?? delay;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.out = options.out ?? null;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Instant monitoring began; null before that. */
  get startedAt(): number | null {
    return this.startTime;
  }

  snapshot(): AggregateSnapshot {
    return this.aggregator.snapshot();
  }

  async run(signal: AbortSignal): Promise<SessionSummary> {
    if (this.currentState !== 'idle') {
      throw new MonitorError(`Session already ${this.currentState}`);
    }

    this.setState('connecting');
    let connection: DeviceConnection;
    try {
      connection = await this.options.connect(this.options.url);
    } catch (error) {
      this.setState('stopped');
      if (error instanceof MonitorError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(message, { cause: error });
    }
    this.logger.info({ url: this.options.url }, 'Connection opened');

    let headless = false;
    try {
      this.setState('waiting-for-system');
      headless = !(await this.waitForSystem(connection, signal));
    } catch (error) {
      await this.closeConnection(connection);
      this.setState('stopped');
      throw error;
    }

    if (signal.aborted) {
      await this.closeConnection(connection);
      this.setState('stopped');
      return { recorded: 0, snapshot: this.aggregator.snapshot(), headless };
    }

    return this.monitor(connection, signal, headless);
  }

  private async monitor(
    connection: DeviceConnection,
    signal: AbortSignal,
    headless: boolean
  ): Promise<SessionSummary> {
    const { monitored } = this.options;
    const channel = new Channel<MessageEvent>();
    const subscriber = new Subscriber({
      bus: connection,
      monitored,
      forward: event => {
        channel.send(event);
      },
      metrics: this.metrics
    });

    this.startTime = this.clock.now();
    const updates = this.aggregator.consume(channel);
    const renderer = new DashboardRenderer({
      aggregator: this.aggregator,
      monitored,
      startTime: this.startTime,
      sink: this.options.sink,
      title: this.options.title,
      intervalMs: this.options.refreshIntervalMs,
      clock: this.clock,
      logger: this.logger,
      metrics: this.metrics
    });

    subscriber.start();
    renderer.start(signal);
    this.setState('monitoring');
    this.print('', 'Monitoring sensor messages. Press Ctrl+C to exit...', '');
    this.logger.info({ monitored, headless }, 'Monitoring started');

    let recorded = 0;
    try {
      await waitForAbort(signal);
    } finally {
      renderer.stop();
      subscriber.stop();
      channel.close();
      recorded = await updates;
      this.logger.info({ recorded }, 'Unsubscribed from messages');
      await this.closeConnection(connection);
      this.setState('stopped');
    }

    return { recorded, snapshot: this.aggregator.snapshot(), headless };
  }

  /**
   * Polls for a discovered system. Returns false when monitoring should go
   * ahead without one.
   */
  private async waitForSystem(connection: DeviceConnection, signal: AbortSignal): Promise<boolean> {
    const { pollIntervalMs, timeoutMs, graceMs, failWithoutSystem } = this.options.readiness;
    const startedAt = this.clock.now();
    this.print('Waiting for system to connect...');

    while (connection.systems().length === 0) {
      if (signal.aborted) {
        return false;
      }
      if (this.clock.now() - startedAt >= timeoutMs) {
        const seconds = Math.round(timeoutMs / 1000);
        this.print(
          `Note: No autopilot system detected after ${seconds} seconds.`,
          'Continuing to listen for MAVLink messages anyway...'
        );
        this.logger.warn({ timeoutMs }, 'No system detected within readiness timeout');
        break;
      }
      await this.sleep(pollIntervalMs, signal);
    }

    if (this.reportSystem(connection)) {
      return true;
    }

    this.print('Listening for MAVLink messages...');
    await this.sleep(graceMs, signal);
    if (signal.aborted) {
      return false;
    }
    if (this.reportSystem(connection)) {
      return true;
    }

    this.print(
      'Warning: No system detected. MAVLink messages may not be received.',
      'Make sure the device is sending MAVLink messages.'
    );

    if (failWithoutSystem) {
      throw new NoDeviceDetectedError(timeoutMs + graceMs);
    }

    this.logger.warn({ graceMs }, 'Continuing without a detected system');
    return false;
  }

  private reportSystem(connection: DeviceConnection): boolean {
    const [system] = connection.systems();
    if (!system) {
      return false;
    }
    this.print('System connected!');
    this.logger.info(
      { systemId: system.systemId, componentId: system.componentId },
      'System discovered'
    );
    return true;
  }

  private async closeConnection(connection: DeviceConnection) {
    try {
      await connection.close();
    } catch (error) {
      this.logger.warn({ err: error }, 'Connection close failed');
    }
  }

  private setState(next: SessionState) {
    const previous = this.currentState;
    this.currentState = next;
    this.emit('state', next, previous);
  }

  private print(...lines: string[]) {
    this.out?.write(`${lines.join('\n')}\n`);
  }
}
