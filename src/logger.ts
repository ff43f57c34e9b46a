import './config/location.js';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'sensor-rate-monitor';

function extractMessage(args: unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (value && typeof value === 'object' && 'msg' in value && typeof value.msg === 'string') {
      return value.msg;
    }
  }
  return undefined;
}

export type Logger = pino.Logger;

export type LoggerOptions = {
  level?: string;
  destination?: pino.DestinationStream;
};

/** Counts every written line per level in the metrics registry. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name,
      level: options.level ?? level,
      hooks: {
        logMethod(inputArgs, method, logLevel) {
          const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
          metrics.incrementLogLevel(resolvedLevel, { message: extractMessage(inputArgs) });
          return method.apply(this, inputArgs);
        }
      }
    },
    // stdout belongs to the dashboard
    options.destination ?? pino.destination(2)
  );
}

const logger = createLogger();

export default logger;
