#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import logger from './logger.js';
import { startMonitor, type MonitorRuntime, type StartMonitorOptions } from './app.js';
import { CONNECTION_URL_FORMATS } from './connection/url.js';
import {
  ConnectionError,
  EXIT,
  MonitorError,
  NoDeviceDetectedError,
  UsageError,
  toError
} from './errors.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type SignalSource = Pick<NodeJS.EventEmitter, 'once' | 'off'>;

export type CliDependencies = {
  start?: (options: StartMonitorOptions) => MonitorRuntime;
  signals?: SignalSource;
};

type CliArgs = { help: true } | { help: false; url: string };

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

export const USAGE_LINES = [
  'Usage: sensor-rate-monitor <connection_url>',
  'Connection URL format should be:',
  ...CONNECTION_URL_FORMATS.map(entry => `  For ${entry.label}: ${entry.format}`),
  'For example, to connect to a serial device: serial:///dev/ttyUSB0:57600'
];

export function parseArgs(argv: readonly string[]): CliArgs {
  if (argv.includes('-h') || argv.includes('--help')) {
    return { help: true };
  }
  if (argv.length !== 1) {
    throw new UsageError(`Expected exactly one connection URL, got ${argv.length} argument(s)`);
  }
  const [url] = argv;
  return { help: false, url };
}

function registerSignalHandlers(runtime: MonitorRuntime, signals: SignalSource): () => void {
  const handleSignal = (signal: NodeJS.Signals) => {
    runtime.stop(signal);
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    signals.once(signal, handleSignal);
  }
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.off(signal, handleSignal);
    }
  };
}

function reportFailure(error: unknown, io: CliIo): number {
  if (error instanceof ConnectionError) {
    logger.error({ err: error }, 'Connection failed');
    io.stderr.write(`Connection failed: ${error.message}\n`);
    return error.exitCode;
  }

  if (error instanceof NoDeviceDetectedError) {
    logger.error({ waitedMs: error.waitedMs }, 'No device detected');
    return error.exitCode;
  }

  const err = toError(error);
  logger.error({ err }, 'Monitor failed');
  io.stderr.write(`Monitor failed: ${err.message}\n`);
  return error instanceof MonitorError ? error.exitCode : EXIT.FAILURE;
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  dependencies: CliDependencies = {}
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return error.exitCode;
    }
    throw error;
  }

  if (args.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return EXIT.SUCCESS;
  }

  const start = dependencies.start ?? startMonitor;
  let runtime: MonitorRuntime;
  try {
    runtime = start({ url: args.url, stdout: io.stdout });
  } catch (error) {
    return reportFailure(error, io);
  }

  const detach = registerSignalHandlers(runtime, dependencies.signals ?? process);
  try {
    await runtime.done;
    return EXIT.SUCCESS;
  } catch (error) {
    return reportFailure(error, io);
  } finally {
    detach();
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return fs.realpathSync(path.resolve(invoked)) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'CLI failed');
      process.exit(EXIT.FAILURE);
    }
  );
}
