import { WallspanError, WallspanEvent } from '../core/layout';
import { LogEntry, LogStatus } from '../types';

let sequence = 0;

function uid(prefix: string): string {
  sequence += 1;
  return `${prefix}-${sequence}`;
}

function levelToStatus(level: WallspanEvent['level']): LogStatus {
  if (level === 'error') return LogStatus.Error;
  if (level === 'warn') return LogStatus.Warn;
  return LogStatus.Ok;
}

export function mapWallspanEventToLogEntry(event: WallspanEvent): LogEntry {
  return {
    id: uid(event.phase),
    stepId: `${event.phase}.${event.code}`,
    title: event.message,
    status: levelToStatus(event.level),
    ms: typeof event.metrics?.ms === 'string' ? Number(event.metrics.ms) || 0 : 0,
    metrics: Object.entries(event.metrics || {}).map(([label, value]) => ({ label, value })),
    description: event.code,
  };
}

export function mapWallspanErrorToLogEntry(error: unknown, fallbackStep: string): LogEntry {
  if (error instanceof WallspanError) {
    return {
      id: uid('wallspan-error'),
      stepId: fallbackStep,
      title: error.message,
      status: LogStatus.Error,
      ms: 0,
      metrics: [
        { label: 'code', value: error.code },
        ...Object.entries(error.details || {}).map(([label, value]) => ({ label, value })),
      ],
      description: error.code,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    id: uid('error'),
    stepId: fallbackStep,
    title: 'Unexpected error',
    status: LogStatus.Error,
    ms: 0,
    metrics: [],
    description: message,
  };
}
