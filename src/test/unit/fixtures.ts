import type { EventDefinition, Signal } from '../../shared/eventClassifier';

export function eventDef(name: string, warnThresholdMs?: number): EventDefinition {
  return {
    name,
    matchesStart: m => m === `START ${name}`,
    matchesEnd: m => m === `END ${name}`,
    warnThresholdMs
  };
}

export function start(definition: EventDefinition): Signal {
  return { kind: 'start', definition };
}

export function end(definition: EventDefinition): Signal {
  return { kind: 'end', definition };
}

export const HEADER_PATTERN =
  '^(?<time>\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}\\.\\d{3})\\s+(?<uid>\\S+)\\s+(?<pid>\\d+)\\s+(?<tid>\\d+)\\s+(?<level>[VDIWEF])\\s+(?<tag>[^:]+?)\\s*:\\s(?<message>.*)$';

export function rawConfig(): Record<string, unknown> {
  return {
    log_header_pattern: HEADER_PATTERN,
    time_format: '%m-%d %H:%M:%S.%f',
    year: 2024,
    events: [
      { name: 'A', start_regex: 'START A', end_regex: 'END A', threshold_ms: 5 },
      { name: 'B', start_regex: 'START B', end_regex: 'END B' }
    ]
  };
}

/** Build a header line for thread `tid` at 10:00:00 plus `ms` on 2024-03-15. */
export function logLine(ms: number, tid: number, message: string): string {
  const frac = String(ms).padStart(3, '0');
  return `03-15 10:00:00.${frac}  u0_a7  100  ${tid} I App: ${message}`;
}

export const BASE_MS = Date.UTC(2024, 2, 15, 10, 0, 0);
