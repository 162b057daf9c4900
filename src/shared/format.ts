function nonNegative(ms: number, round: (n: number) => number): number {
  return Number.isFinite(ms) ? Math.max(0, round(ms)) : 0;
}

/** Whole milliseconds, e.g. `12ms`. */
export function formatMs(ms: number): string {
  return `${nonNegative(ms, Math.round)}ms`;
}

// Largest unit first; each applies once the value reaches its size
const DURATION_UNITS: ReadonlyArray<[label: string, sizeMs: number]> = [
  ['h', 3_600_000],
  ['min', 60_000],
  ['s', 1_000]
];

/** Run totals for the summary line: `850 ms`, `1.5 s`, `2 min`. */
export function formatDuration(ms: number): string {
  const n = nonNegative(ms, Math.floor);
  const unit = DURATION_UNITS.find(([, size]) => n >= size);
  if (!unit) return `${n} ms`;
  const [label, size] = unit;
  const value = (n / size).toFixed(1).replace(/\.0$/, '');
  return `${value} ${label}`;
}
