export enum LogStatus {
  Ok = 'ok',
  Warn = 'warn',
  Error = 'error',
}

export interface LogMetric {
  label: string;
  value: string | number;
}

export interface LogEntry {
  id: string;
  stepId: string;
  title: string;
  status: LogStatus;
  ms: number;
  metrics: LogMetric[];
  description?: string;
}

export type LogSink = (log: LogEntry) => void;
