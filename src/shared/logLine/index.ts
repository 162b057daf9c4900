import type { Instant, ThreadId } from '../callTree';
import type { InstantParser } from './timestamp';

export { compileTimestampFormat } from './timestamp';
export type { InstantParser } from './timestamp';

export type DecodedLogLine = {
  instant: Instant;
  threadId: ThreadId;
  level?: string;
  tag?: string;
  message: string;
};

export type LogLineDecoder = (line: string) => DecodedLogLine | undefined;

export const REQUIRED_HEADER_GROUPS = ['time', 'tid', 'message'] as const;

/** Names of the named capture groups a pattern declares. */
export function namedGroupsOf(pattern: RegExp): string[] {
  // An empty alternative always matches, and `groups` then lists every name with an undefined value
  const probe = new RegExp(`${pattern.source}|`, pattern.flags.replace(/[gy]/g, ''));
  const groups = probe.exec('')?.groups;
  return groups ? Object.keys(groups) : [];
}

export function createLogLineDecoder(opts: { headerPattern: RegExp; parseInstant: InstantParser }): LogLineDecoder {
  const header = new RegExp(opts.headerPattern.source, opts.headerPattern.flags.replace(/[gy]/g, ''));
  return (raw: string) => {
    const line = raw.trim();
    if (!line) return undefined;
    const m = header.exec(line);
    // Header must start the line; a match further in is some other text
    if (!m || m.index !== 0 || !m.groups) return undefined;
    const { time, tid, message, level, tag } = m.groups;
    if (time === undefined || tid === undefined || message === undefined) return undefined;
    if (!/^\d+$/.test(tid.trim())) return undefined;
    const instant = opts.parseInstant(time);
    if (instant === undefined) return undefined;
    return {
      instant,
      threadId: Number(tid.trim()),
      level: level?.trim() || undefined,
      tag: tag?.trim() || undefined,
      message
    };
  };
}
