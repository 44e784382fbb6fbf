export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, message: string, meta?: unknown) => void;

let sink: LogSink | null = null;

/** Installs the process-wide log sink, or removes it with `null`. */
export function setLogSink(next: LogSink | null): void {
  sink = next;
}

/** Forwards to the installed sink; false when no sink took the event. */
export function logEvent(level: LogLevel, message: string, meta?: unknown): boolean {
  if (!sink) return false;
  try {
    sink(level, message, meta);
    return true;
  } catch {
    return false;
  }
}
