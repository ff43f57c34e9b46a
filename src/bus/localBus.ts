import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type {
  Clock,
  MessageBus,
  MessageCallback,
  MessageEvent,
  SubscriptionHandle
} from '../types.js';

const MESSAGE_CHANNEL = 'message';

/** Every message, whatever its name. */
export const ALL_MESSAGES = '';

export const monotonicClock: Clock = {
  now: () => performance.now()
};

interface LocalMessageBusDependencies {
  clock?: Clock;
  metrics?: MetricsRegistry;
}

type Subscription = {
  handle: SubscriptionHandle;
  listener: (event: MessageEvent) => void;
};

/**
 * In-process implementation of the message bus contract. Callbacks run
 * synchronously from {@link LocalMessageBus.publish}, in subscription order.
 */
export class LocalMessageBus extends EventEmitter implements MessageBus {
  private readonly clock: Clock;
  private readonly metrics: MetricsRegistry;
  private readonly subscriptions = new Map<number, Subscription>();
  private nextId = 1;

  constructor(dependencies: LocalMessageBusDependencies = {}) {
    super();
    this.clock = dependencies.clock ?? monotonicClock;
    this.metrics = dependencies.metrics ?? defaultMetrics;
    this.setMaxListeners(0);
  }

  subscribe(filter: string, callback: MessageCallback): SubscriptionHandle {
    const handle: SubscriptionHandle = Object.freeze({ id: this.nextId++, filter });
    const listener = (event: MessageEvent) => {
      if (filter === ALL_MESSAGES || filter === event.name) {
        callback(event);
      }
    };
    this.subscriptions.set(handle.id, { handle, listener });
    this.on(MESSAGE_CHANNEL, listener);
    return handle;
  }

  unsubscribe(handle: SubscriptionHandle): void {
    const subscription = this.subscriptions.get(handle.id);
    if (!subscription) {
      return;
    }
    this.subscriptions.delete(handle.id);
    this.off(MESSAGE_CHANNEL, subscription.listener);
  }

  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  /** Stamps the arrival instant and delivers to every matching subscriber. */
  publish(name: string, receivedAt: number = this.clock.now()): MessageEvent {
    const event: MessageEvent = { name, receivedAt };
    this.metrics.increment('bus.messages.delivered');
    this.emit(MESSAGE_CHANNEL, event);
    return event;
  }
}
