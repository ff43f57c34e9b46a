import { EventEmitter } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import { createSink, startMonitor, type StartMonitorOptions } from '../src/app.js';
import { USAGE_LINES, parseArgs, runCli } from '../src/cli.js';
import { ConnectionError, UsageError } from '../src/errors.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { LogSink, TerminalSink } from '../src/monitor/sinks.js';
import {
  CollectingSink,
  captureLogs,
  FakeConnection,
  ManualClock,
  buildConfig,
  clockSleep,
  createOutput
} from './helpers/fakes.js';

function createIo() {
  const stdout = createOutput();
  const stderr = createOutput();
  return { stdout, stderr, io: { stdout: stdout.stream, stderr: stderr.stream } };
}

function startWith(connect: StartMonitorOptions['connect'], clock = new ManualClock()) {
  return (options: StartMonitorOptions) =>
    startMonitor({
      ...options,
      config: buildConfig(),
      connect,
      sink: new CollectingSink(),
      clock,
      sleep: clockSleep(clock)
    });
}

function isRecordWithMessage(record: unknown, msg: string): boolean {
  return typeof record === 'object' && record !== null && 'msg' in record && record.msg === msg;
}

describe('parseArgs', () => {
  it('takes exactly one connection url', () => {
    expect(parseArgs(['udpin://0.0.0.0:14550'])).toEqual({ help: false, url: 'udpin://0.0.0.0:14550' });
    expect(parseArgs(['--help'])).toEqual({ help: true });
    expect(() => parseArgs([])).toThrow(UsageError);
    expect(() => parseArgs(['a', 'b'])).toThrow(
      'Expected exactly one connection URL, got 2 argument(s)'
    );
  });
});

describe('runCli', () => {
  it('prints usage on help and exits cleanly', async () => {
    const { io, stdout, stderr } = createIo();

    await expect(runCli(['-h'], io)).resolves.toBe(0);
    expect(stdout.text()).toBe(`${USAGE_LINES.join('\n')}\n`);
    expect(stderr.text()).toBe('');
  });

  it('prints usage to stderr when the url is missing', async () => {
    const { io, stdout, stderr } = createIo();
    const start = vi.fn();

    await expect(runCli([], io, { start })).resolves.toBe(1);
    expect(start).not.toHaveBeenCalled();
    expect(stdout.text()).toBe('');
    expect(stderr.lines().slice(0, 3)).toEqual([
      'Usage: sensor-rate-monitor <connection_url>',
      'Connection URL format should be:',
      '  For TCP server: tcpin://<our_ip>:<port>'
    ]);
    expect(stderr.text()).toContain(
      'For example, to connect to a serial device: serial:///dev/ttyUSB0:57600\n'
    );
  });

  it('reports connection failures', async () => {
    const { io, stderr } = createIo();
    const start = startWith(async url => {
      throw new ConnectionError(`Invalid connection URL: ${url}`);
    });

    await expect(runCli(['bogus'], io, { start })).resolves.toBe(1);
    expect(stderr.text()).toBe('Connection failed: Invalid connection URL: bogus\n');
  });

  it('wraps transport errors as connection failures', async () => {
    const { io, stderr } = createIo();
    const start = startWith(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:5760');
    });

    await expect(runCli(['tcpout://127.0.0.1:5760'], io, { start })).resolves.toBe(1);
    expect(stderr.text()).toBe('Connection failed: connect ECONNREFUSED 127.0.0.1:5760\n');
  });

  it('exits with failure when no device shows up', async () => {
    const { io, stdout, stderr } = createIo();
    const clock = new ManualClock();
    const start = startWith(async () => new FakeConnection(clock), clock);

    await expect(runCli(['udpin://0.0.0.0:14550'], io, { start })).resolves.toBe(1);
    expect(stderr.text()).toBe('');
    expect(stdout.lines().at(-2)).toBe('Make sure the device is sending MAVLink messages.');
  });

  it('reports unexpected startup errors', async () => {
    const { io, stderr } = createIo();
    const start = () => {
      throw new Error('config unreadable');
    };

    await expect(runCli(['udpin://0.0.0.0:14550'], io, { start })).resolves.toBe(1);
    expect(stderr.text()).toBe('Monitor failed: config unreadable\n');
  });

  it('shuts down gracefully on a signal', async () => {
    const { io, stdout } = createIo();
    const signals = new EventEmitter();
    const clock = new ManualClock();
    const connection = new FakeConnection(clock);
    connection.addSystem();
    const start = startWith(async () => connection, clock);

    const exit = runCli(['tcpin://0.0.0.0:5760'], io, { start, signals });
    expect(signals.listenerCount('SIGINT')).toBe(1);
    signals.emit('SIGINT', 'SIGINT');

    await expect(exit).resolves.toBe(0);
    expect(connection.closeCalls).toBe(1);
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
    expect(stdout.lines()[0]).toBe('Waiting for system to connect...');
  });
});

describe('startMonitor', () => {
  it('runs a session until stopped and logs the final metrics', async () => {
    const clock = new ManualClock();
    const connection = new FakeConnection(clock);
    connection.addSystem();
    const output = createOutput();
    const capture = captureLogs();
    const metrics = new MetricsRegistry();
    const config = buildConfig();
    config.monitor.refreshIntervalMs = 10;

    const runtime = startMonitor({
      url: 'udpin://0.0.0.0:14550',
      config,
      stdout: output.stream,
      connect: async () => connection,
      sink: new CollectingSink(),
      clock,
      sleep: clockSleep(clock),
      logger: capture.logger,
      metrics
    });

    await vi.waitFor(() => {
      expect(runtime.session.state).toBe('monitoring');
    });
    connection.publish('HEARTBEAT', 5);
    connection.publish('HEARTBEAT', 6);
    await vi.waitFor(() => {
      expect(metrics.getCounter('renderer.ticks')).toBeGreaterThan(0);
    });
    runtime.stop();
    runtime.stop();

    const summary = await runtime.done;
    expect(summary.recorded).toBe(2);
    expect(runtime.session.state).toBe('stopped');

    const stopped = capture.records().filter(record => isRecordWithMessage(record, 'Monitor stopped'));
    expect(stopped).toHaveLength(1);
    expect(stopped[0]).toMatchObject({
      recorded: 2,
      metrics: {
        counters: { 'subscriber.messages.accepted': 2 },
        latencies: { 'renderer.tick.ms': expect.objectContaining({ count: expect.any(Number) }) },
        logs: expect.objectContaining({ byLevel: expect.any(Object) })
      }
    });
    expect(
      capture.records().filter(record => isRecordWithMessage(record, 'Monitor shutting down'))
    ).toHaveLength(1);
  });

  it('picks the sink from the display mode', () => {
    const output = createOutput();
    const config = buildConfig();

    expect(createSink(config, output.stream)).toBeInstanceOf(TerminalSink);
    config.monitor.display = 'log';
    expect(createSink(config, output.stream)).toBeInstanceOf(LogSink);
  });
});
