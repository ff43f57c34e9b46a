export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export class MonitorError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT.FAILURE, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorError';
    this.exitCode = exitCode;
  }
}

/** Wrong argument count on the command line. */
export class UsageError extends MonitorError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** The connection URL could not be parsed or the transport failed to open. */
export class ConnectionError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT.FAILURE, options);
    this.name = 'ConnectionError';
  }
}

export class NoDeviceDetectedError extends MonitorError {
  readonly waitedMs: number;

  constructor(waitedMs: number) {
    super(`No system detected after ${waitedMs}ms`);
    this.name = 'NoDeviceDetectedError';
    this.waitedMs = waitedMs;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
