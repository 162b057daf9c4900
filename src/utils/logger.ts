// Diagnostics go to stderr so the report on stdout stays clean
export type LogSink = (line: string) => void;

type Level = 'INFO' | 'WARN' | 'ERROR' | 'TRACE';

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

let sink: LogSink = stderrSink;
let traceEnabled = false;

// Stack only at trace level
function describeError(err: Error): string {
  const head = `${err.name}: ${err.message}`;
  return traceEnabled && err.stack ? `${head}\n${err.stack}` : head;
}

function renderPart(part: unknown): string {
  if (part instanceof Error) return describeError(part);
  if (part === null || typeof part !== 'object') return String(part);
  try {
    return JSON.stringify(part);
  } catch {
    return String(part);
  }
}

function clock(d = new Date()): string {
  return [d.getHours(), d.getMinutes(), d.getSeconds()].map(n => String(n).padStart(2, '0')).join(':');
}

function emit(level: Level, parts: unknown[]): void {
  sink(`[${clock()}] ${level.padEnd(5)} ${parts.map(renderPart).join(' ')}`);
}

/** Replace the output sink; call without arguments to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

export function logInfo(...parts: unknown[]): void {
  emit('INFO', parts);
}

export function logWarn(...parts: unknown[]): void {
  emit('WARN', parts);
}

export function logError(...parts: unknown[]): void {
  emit('ERROR', parts);
}

export function setTraceEnabled(enabled: boolean): void {
  traceEnabled = enabled;
  logTrace('Trace logging enabled');
}

export function isTraceEnabled(): boolean {
  return traceEnabled;
}

export function logTrace(...parts: unknown[]): void {
  if (traceEnabled) emit('TRACE', parts);
}
