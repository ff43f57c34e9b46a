import defaultLogger, { type Logger } from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import { resolveConfig, type MonitorConfig } from './config/index.js';
import { connectMavlink } from './connection/mavlinkConnection.js';
import { MonitorSession, type SessionOptions, type SessionSummary } from './monitor/session.js';
import { LogSink, TerminalSink } from './monitor/sinks.js';
import type { RenderSink } from './monitor/renderer.js';
import type { DeviceConnection } from './types.js';

export type MonitorRuntime = {
  session: MonitorSession;
  /** Settles once the session has stopped and released the connection. */
  done: Promise<SessionSummary>;
  stop: (reason?: string) => void;
};

export type StartMonitorOptions = {
  url: string;
  config?: MonitorConfig;
  stdout?: NodeJS.WritableStream;
  connect?: (url: string) => Promise<DeviceConnection>;
  sink?: RenderSink;
  logger?: Logger;
  metrics?: MetricsRegistry;
} & Pick<SessionOptions, 'clock' | 'sleep'>;

export function createSink(
  config: MonitorConfig,
  stdout: NodeJS.WritableStream,
  logger: Logger = defaultLogger
): RenderSink {
  if (config.monitor.display === 'log') {
    return new LogSink(logger);
  }
  return new TerminalSink(stdout);
}

export function startMonitor(options: StartMonitorOptions): MonitorRuntime {
  const config = options.config ?? resolveConfig();
  const stdout = options.stdout ?? process.stdout;
  const logger = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? defaultMetrics;
  const controller = new AbortController();

  const session = new MonitorSession({
    url: options.url,
    connect:
      options.connect ?? (url => connectMavlink(url, config.connection, { logger, metrics })),
    monitored: Object.freeze([...config.monitor.messages]),
    readiness: config.readiness,
    refreshIntervalMs: config.monitor.refreshIntervalMs,
    title: config.app.title,
    sink: options.sink ?? createSink(config, stdout, logger),
    out: stdout,
    clock: options.clock,
    sleep: options.sleep,
    logger,
    metrics
  });

  const done = session.run(controller.signal).then(summary => {
    logger.info({ recorded: summary.recorded, metrics: metrics.snapshot() }, 'Monitor stopped');
    return summary;
  });

  return {
    session,
    done,
    stop(reason = 'stop') {
      if (!controller.signal.aborted) {
        logger.info({ reason }, 'Monitor shutting down');
        controller.abort(reason);
      }
    }
  };
}
