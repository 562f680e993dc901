import { PROGRAM_NAME } from '../constants';
import { LogEntry, LogSink, LogStatus } from '../types';

export interface ConsoleReporterOptions {
  verbose: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

function formatMetrics(entry: LogEntry): string {
  if (entry.metrics.length === 0) return '';
  return ` (${entry.metrics.map((m) => `${m.label}=${m.value}`).join(', ')})`;
}

export function formatLogEntry(entry: LogEntry): string {
  switch (entry.status) {
    case LogStatus.Error: {
      const detail = entry.description && entry.description !== entry.title ? ` [${entry.description}]` : '';
      return `Error in ${PROGRAM_NAME}: ${entry.title}${detail}`;
    }
    case LogStatus.Warn:
      return `Warning from ${PROGRAM_NAME}: ${entry.title}${formatMetrics(entry)}`;
    default:
      return `${entry.title}${formatMetrics(entry)}`;
  }
}

/**
 * Print log entries to the terminal. Warnings and errors always go to stderr;
 * everything else only in verbose mode.
 */
export function createConsoleReporter(options: ConsoleReporterOptions): LogSink {
  const out = options.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = options.err ?? ((line: string) => process.stderr.write(`${line}\n`));

  return (entry) => {
    if (entry.status === LogStatus.Error || entry.status === LogStatus.Warn) {
      err(formatLogEntry(entry));
      return;
    }
    if (options.verbose) {
      out(formatLogEntry(entry));
    }
  };
}
