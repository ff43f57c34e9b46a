export type MonitoredName = string;

export interface MessageEvent {
  name: string;
  /** Monotonic arrival instant, milliseconds. */
  receivedAt: number;
}

export interface AggregateEntry {
  count: number;
  lastSeen: number | null;
}

export type AggregateSnapshot = ReadonlyMap<MonitoredName, Readonly<AggregateEntry>>;

export interface Clock {
  now(): number;
}

export type MessageCallback = (event: MessageEvent) => void;

export interface SubscriptionHandle {
  readonly id: number;
  readonly filter: string;
}

export interface MessageBus {
  subscribe(filter: string, callback: MessageCallback): SubscriptionHandle;
  unsubscribe(handle: SubscriptionHandle): void;
}

export interface DeviceSystem {
  systemId: number;
  componentId: number;
  discoveredAt: number;
}

export interface DeviceConnection extends MessageBus {
  systems(): DeviceSystem[];
  close(): Promise<void>;
}
