import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { LocalMessageBus, monotonicClock } from '../bus/localBus.js';
import type { ConnectionConfig } from '../config/index.js';
import type {
  Clock,
  DeviceConnection,
  DeviceSystem,
  MessageCallback,
  SubscriptionHandle
} from '../types.js';
import {
  HEARTBEAT_ID,
  MavlinkParser,
  MessageTable,
  encodeHeartbeat,
  type MavlinkFrame
} from './mavlink.js';
import { openTransport, type Transport } from './transport.js';
import { parseConnectionUrl } from './url.js';

export type MavlinkConnectionOptions = ConnectionConfig & {
  transport: Transport;
  table: MessageTable;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

/**
 * Device connection over a byte transport: decodes frames, names them from
 * the message table and republishes them on an in-process bus. Systems are
 * discovered from their HEARTBEAT.
 */
export class MavlinkConnection implements DeviceConnection {
  private readonly transport: Transport;
  private readonly table: MessageTable;
  private readonly parser: MavlinkParser;
  private readonly bus: LocalMessageBus;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly ownSystemId: number;
  private readonly ownComponentId: number;
  private readonly discovered = new Map<number, DeviceSystem>();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private sequence = 0;
  private closed = false;

  private readonly handleData = (chunk: Buffer) => {
    for (const frame of this.parser.push(chunk)) {
      this.handleFrame(frame);
    }
  };

  private readonly handleError = (error: Error) => {
    this.logger.warn({ err: error, transport: this.transport.description }, 'Transport error');
  };

  constructor(options: MavlinkConnectionOptions) {
    const metrics = options.metrics ?? defaultMetrics;
    this.transport = options.transport;
    this.table = options.table;
    this.clock = options.clock ?? monotonicClock;
    this.logger = options.logger ?? defaultLogger;
    this.ownSystemId = options.systemId;
    this.ownComponentId = options.componentId;
    this.parser = new MavlinkParser({
      table: options.table,
      verifyChecksums: options.verifyChecksums,
      metrics
    });
    this.bus = new LocalMessageBus({ clock: this.clock, metrics });

    this.transport.on('data', this.handleData);
    this.transport.on('error', this.handleError);

    if (options.heartbeatIntervalMs > 0) {
      this.sendHeartbeat();
      this.heartbeatTimer = setInterval(() => this.sendHeartbeat(), options.heartbeatIntervalMs);
      this.heartbeatTimer.unref();
    }
  }

  subscribe(filter: string, callback: MessageCallback): SubscriptionHandle {
    return this.bus.subscribe(filter, callback);
  }

  unsubscribe(handle: SubscriptionHandle): void {
    this.bus.unsubscribe(handle);
  }

  systems(): DeviceSystem[] {
    return Array.from(this.discovered.values());
  }

  get rejectedFrames(): number {
    return this.parser.rejectedFrames;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.transport.off('data', this.handleData);
    this.transport.off('error', this.handleError);
    await this.transport.close();
    this.logger.debug({ transport: this.transport.description }, 'Transport closed');
  }

  private handleFrame(frame: MavlinkFrame) {
    const receivedAt = this.clock.now();
    if (frame.messageId === HEARTBEAT_ID && frame.systemId !== this.ownSystemId) {
      this.discover(frame, receivedAt);
    }
    this.bus.publish(this.table.nameOf(frame.messageId), receivedAt);
  }

  private discover(frame: MavlinkFrame, at: number) {
    if (this.discovered.has(frame.systemId)) {
      return;
    }
    const system: DeviceSystem = {
      systemId: frame.systemId,
      componentId: frame.componentId,
      discoveredAt: at
    };
    this.discovered.set(frame.systemId, system);
    this.logger.debug(system, 'MAVLink system discovered');
  }

  private sendHeartbeat() {
    const frame = encodeHeartbeat({
      systemId: this.ownSystemId,
      componentId: this.ownComponentId,
      sequence: this.sequence
    });
    this.sequence = (this.sequence + 1) & 0xff;
    this.transport.send(frame);
  }
}

export type ConnectDependencies = {
  open?: typeof openTransport;
  table?: MessageTable;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export async function connectMavlink(
  url: string,
  config: ConnectionConfig,
  dependencies: ConnectDependencies = {}
): Promise<MavlinkConnection> {
  const endpoint = parseConnectionUrl(url);
  const open = dependencies.open ?? openTransport;
  const table = dependencies.table ?? MessageTable.load();
  const transport = await open(endpoint);
  (dependencies.logger ?? defaultLogger).info(
    { transport: transport.description, local: transport.localAddress() },
    'Transport opened'
  );
  return new MavlinkConnection({
    ...config,
    transport,
    table,
    clock: dependencies.clock,
    logger: dependencies.logger,
    metrics: dependencies.metrics
  });
}
