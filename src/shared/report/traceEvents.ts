import type { Instant, TraceNode } from '../callTree';

// Shape read by chrome://tracing and ui.perfetto.dev; field names must not change
export type TraceEvent = {
  name: string;
  cat: string;
  ph: 'B' | 'E';
  ts: number; // microseconds
  pid: number;
  tid: number;
};

export type TraceExportOptions = {
  pid?: number;
  category?: string;
};

const DEFAULT_TRACE_PID = 1;
const DEFAULT_TRACE_CATEGORY = 'PERF';
// Width given to a node that reaches export without an end instant
export const UNSET_END_OFFSET_US = 100;

function toMicros(instant: Instant): number {
  return Math.round(instant * 1000);
}

/**
 * Flatten the forest into begin/end records. Each node's begin is followed by
 * its whole subtree and then its own end, so nesting is preserved.
 */
export function exportTraceEvents(forest: readonly TraceNode[], opts?: TraceExportOptions): TraceEvent[] {
  const pid = opts?.pid ?? DEFAULT_TRACE_PID;
  const cat = opts?.category ?? DEFAULT_TRACE_CATEGORY;
  const events: TraceEvent[] = [];
  const stack: Array<{ node: TraceNode; closing: boolean }> = [];
  for (let i = forest.length - 1; i >= 0; i--) stack.push({ node: forest[i]!, closing: false });

  while (stack.length) {
    const { node, closing } = stack.pop()!;
    if (closing) {
      const ts = node.end !== undefined ? toMicros(node.end) : toMicros(node.start) + UNSET_END_OFFSET_US;
      events.push({ name: node.name, cat, ph: 'E', ts, pid, tid: node.threadId });
      continue;
    }
    events.push({ name: node.name, cat, ph: 'B', ts: toMicros(node.start), pid, tid: node.threadId });
    stack.push({ node, closing: true });
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ node: node.children[i]!, closing: false });
    }
  }
  return events;
}

export function serializeTraceEvents(events: readonly TraceEvent[]): string {
  return JSON.stringify(events);
}
