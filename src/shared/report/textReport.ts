import { durationMs, selfTimeMs, walkPreOrder } from '../callTree';
import type { ThreadId, TraceNode } from '../callTree';
import type { EventDefinition } from '../eventClassifier';
import { formatDuration, formatMs } from '../format';

export type ReportStatus = 'warn' | 'ok';

export type ReportRow = {
  depth: number;
  name: string;
  durationMs: number;
  selfTimeMs: number;
  threadId: ThreadId;
  status: ReportStatus;
};

export type ReportSummary = {
  roots: number;
  events: number;
  slow: number;
  totalMs: number; // sum of root durations
};

const TITLE = '--- PERFORMANCE REPORT (Call Tree) ---';
const RULE = '-'.repeat(TITLE.length);

function thresholdsByName(definitions: readonly EventDefinition[]): Map<string, number | undefined> {
  // First definition wins when a name is configured twice
  const map = new Map<string, number | undefined>();
  for (const d of definitions) {
    if (!map.has(d.name)) map.set(d.name, d.warnThresholdMs);
  }
  return map;
}

export function buildReportRows(forest: readonly TraceNode[], definitions: readonly EventDefinition[]): ReportRow[] {
  const thresholds = thresholdsByName(definitions);
  const rows: ReportRow[] = [];
  walkPreOrder(forest, (node, depth) => {
    const total = durationMs(node);
    const threshold = thresholds.get(node.name);
    rows.push({
      depth,
      name: node.name,
      durationMs: total,
      selfTimeMs: selfTimeMs(node),
      threadId: node.threadId,
      status: threshold !== undefined && total > threshold ? 'warn' : 'ok'
    });
  });
  return rows;
}

export function summarizeRows(rows: readonly ReportRow[]): ReportSummary {
  const roots = rows.filter(r => r.depth === 0);
  return {
    roots: roots.length,
    events: rows.length,
    slow: rows.filter(r => r.status === 'warn').length,
    totalMs: roots.reduce((m, r) => m + r.durationMs, 0)
  };
}

export function renderTextReport(rows: readonly ReportRow[]): string {
  const lines: string[] = [TITLE];
  for (const row of rows) {
    const indent = '  '.repeat(row.depth);
    const branch = row.depth > 0 ? '└─' : 'ROOT:';
    const mark = row.status === 'warn' ? 'SLOW' : 'OK';
    lines.push(`${indent}${branch} ${mark} [${row.name}]`);
    lines.push(
      `${indent}   Total: ${formatMs(row.durationMs)} | Self: ${formatMs(row.selfTimeMs)} | Thread: ${row.threadId}`
    );
  }
  lines.push(RULE);
  const summary = summarizeRows(rows);
  lines.push(
    `Roots: ${summary.roots} | Events: ${summary.events} | Slow: ${summary.slow} | Total: ${formatDuration(summary.totalMs)}`
  );
  return lines.join('\n') + '\n';
}
