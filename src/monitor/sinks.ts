import type { Logger } from '../logger.js';
import { formatRate, type DashboardFrame, type RenderSink } from './renderer.js';

export const CLEAR_SCREEN = '\u001b[2J\u001b[H';

type Column = {
  label: string;
  width: number;
  align: 'left' | 'right';
};

const COLUMNS: readonly Column[] = [
  { label: 'Message Name', width: 26, align: 'left' },
  { label: 'Total', width: 5, align: 'right' },
  { label: 'Rate (Hz)', width: 9, align: 'right' },
  { label: 'Last Seen', width: 12, align: 'left' }
];

const SEGMENTS = COLUMNS.map(column => '─'.repeat(column.width + 2));
const INNER_WIDTH = SEGMENTS.reduce((total, segment) => total + segment.length, 0) + COLUMNS.length - 1;

function fit(text: string, column: Column): string {
  const clipped = text.length > column.width ? text.slice(0, column.width) : text;
  return column.align === 'left' ? clipped.padEnd(column.width) : clipped.padStart(column.width);
}

function banner(text: string): string {
  const width = INNER_WIDTH - 2;
  const clipped = text.length > width ? text.slice(0, width) : text;
  return `│ ${clipped.padEnd(width)} │`;
}

function tableRow(cells: readonly string[], alignHeader = false): string {
  const rendered = COLUMNS.map((column, index) =>
    fit(cells[index] ?? '', alignHeader ? { ...column, align: 'left' } : column)
  );
  return `│ ${rendered.join(' │ ')} │`;
}

export function renderTable(frame: DashboardFrame): string[] {
  const lines = [
    `┌${'─'.repeat(INNER_WIDTH)}┐`,
    banner(frame.title),
    banner(`Runtime: ${String(frame.elapsedSeconds).padStart(3)} seconds`),
    `├${SEGMENTS.join('┬')}┤`,
    tableRow(
      COLUMNS.map(column => column.label),
      true
    ),
    `├${SEGMENTS.join('┼')}┤`
  ];

  for (const row of frame.rows) {
    lines.push(tableRow([row.name, String(row.count), formatRate(row.rate), row.lastSeen]));
  }

  lines.push(`└${SEGMENTS.join('┴')}┘`);

  if (frame.waitingFor) {
    lines.push('', '⚠ No monitored messages received yet.', `  Waiting for: ${frame.waitingFor.join(', ')}`);
  }

  return lines;
}

export type TerminalSinkOptions = {
  clearScreen?: boolean;
};

/** Clears the terminal and redraws the table on each frame. */
export class TerminalSink implements RenderSink {
  private readonly stream: NodeJS.WritableStream;
  private readonly clearScreen: boolean;

  constructor(stream: NodeJS.WritableStream, options: TerminalSinkOptions = {}) {
    this.stream = stream;
    this.clearScreen = options.clearScreen ?? true;
  }

  render(frame: DashboardFrame): void {
    const prefix = this.clearScreen ? CLEAR_SCREEN : '';
    this.stream.write(`${prefix}${renderTable(frame).join('\n')}\n`);
  }
}

/** One structured line per frame, for non-interactive output. */
export class LogSink implements RenderSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  render(frame: DashboardFrame): void {
    this.logger.info(
      {
        elapsedSeconds: frame.elapsedSeconds,
        messages: frame.rows.map(row => ({
          name: row.name,
          total: row.count,
          rateHz: Number(formatRate(row.rate)),
          lastSeen: row.lastSeen
        })),
        waitingFor: frame.waitingFor
      },
      'Message rates'
    );
  }
}
