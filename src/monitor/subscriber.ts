import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { ALL_MESSAGES } from '../bus/localBus.js';
import type { MessageBus, MessageEvent, MonitoredName, SubscriptionHandle } from '../types.js';

export type SubscriberOptions = {
  bus: MessageBus;
  monitored: readonly MonitoredName[];
  forward: (event: MessageEvent) => void;
  metrics?: MetricsRegistry;
};

/**
 * Holds one bus subscription and forwards whitelisted messages. Anything
 * else is dropped without further effect.
 */
export class Subscriber {
  private readonly bus: MessageBus;
  private readonly whitelist: ReadonlySet<MonitoredName>;
  private readonly forward: (event: MessageEvent) => void;
  private readonly metrics: MetricsRegistry;
  private handle: SubscriptionHandle | null = null;

  constructor(options: SubscriberOptions) {
    this.bus = options.bus;
    this.whitelist = new Set(options.monitored);
    this.forward = options.forward;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  get active(): boolean {
    return this.handle !== null;
  }

  isMonitored(name: string): boolean {
    return this.whitelist.has(name);
  }

  start(): void {
    if (this.handle) {
      return;
    }
    this.handle = this.bus.subscribe(ALL_MESSAGES, event => {
      this.handleMessage(event);
    });
  }

  stop(): void {
    if (!this.handle) {
      return;
    }
    this.bus.unsubscribe(this.handle);
    this.handle = null;
  }

  private handleMessage(event: MessageEvent) {
    if (!this.whitelist.has(event.name)) {
      this.metrics.increment('subscriber.messages.ignored');
      return;
    }
    this.metrics.increment('subscriber.messages.accepted');
    this.forward(event);
  }
}
