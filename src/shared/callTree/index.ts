export { CallStackEngine } from './engine';
export { countNodes, createTraceNode, durationMs, selfTimeMs, walkPreOrder } from './types';
export type { Instant, ObserveOutcome, ThreadId, TraceNode } from './types';
