export type ThreadId = number;

// Milliseconds since the Unix epoch (UTC); fractional when the log carries sub-millisecond precision
export type Instant = number;

export type TraceNode = {
  name: string;
  start: Instant;
  end?: Instant; // unset while the event is open
  threadId: ThreadId;
  children: TraceNode[]; // arrival order
  parent?: TraceNode; // non-owning; only read while maintaining the thread stack
};

export type ObserveOutcome = 'opened' | 'closed' | 'discarded';

export function createTraceNode(name: string, start: Instant, threadId: ThreadId): TraceNode {
  return { name, start, threadId, children: [] };
}

export function durationMs(node: TraceNode): number {
  if (node.end === undefined) return 0;
  return Math.max(0, node.end - node.start);
}

/** Duration minus the summed duration of direct children, never below zero. */
export function selfTimeMs(node: TraceNode): number {
  const childrenTotal = node.children.reduce((m, c) => m + durationMs(c), 0);
  return Math.max(0, durationMs(node) - childrenTotal);
}

/** Pre-order walk using an explicit stack so very deep traces cannot overflow the call stack. */
export function walkPreOrder(roots: readonly TraceNode[], visit: (node: TraceNode, depth: number) => void): void {
  const stack: Array<{ node: TraceNode; depth: number }> = [];
  for (let i = roots.length - 1; i >= 0; i--) stack.push({ node: roots[i]!, depth: 0 });
  while (stack.length) {
    const { node, depth } = stack.pop()!;
    visit(node, depth);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ node: node.children[i]!, depth: depth + 1 });
    }
  }
}

export function countNodes(roots: readonly TraceNode[]): number {
  let n = 0;
  walkPreOrder(roots, () => {
    n++;
  });
  return n;
}
