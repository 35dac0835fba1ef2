export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  metadata: Record<string, unknown>;
}

export type LogSink = (line: string, level: LogLevel) => void;

function consoleSink(line: string, level: LogLevel): void {
  if (level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
}

let sink: LogSink = consoleSink;

/** Redirects log lines, e.g. into an array in tests. Returns the previous sink. */
export function setLogSink(next: LogSink | null): LogSink {
  const previous = sink;
  sink = next ?? consoleSink;
  return previous;
}

export function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    metadata: metadata ?? {}
  };

  sink(JSON.stringify(entry), level);
}
