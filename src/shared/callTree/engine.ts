import type { Signal } from '../eventClassifier';
import { createTraceNode } from './types';
import type { Instant, ObserveOutcome, ThreadId, TraceNode } from './types';

/**
 * Rebuilds per-thread call trees from a sequential stream of start/end signals.
 *
 * One stack of open nodes is kept per thread id. A start always opens a new node
 * under the current top of its thread; an end only closes the top node, and only
 * when the names agree. Anything else is dropped without unwinding, which keeps
 * every observation O(1) at the cost of ignoring out-of-order end markers.
 */
export class CallStackEngine {
  private readonly stacks = new Map<ThreadId, TraceNode[]>();
  private readonly roots: TraceNode[] = [];

  get forest(): readonly TraceNode[] {
    return this.roots;
  }

  observe(threadId: ThreadId, instant: Instant, signal: Signal): ObserveOutcome {
    if (signal.kind === 'start') {
      this.open(threadId, instant, signal.definition.name);
      return 'opened';
    }
    return this.close(threadId, instant, signal.definition.name) ? 'closed' : 'discarded';
  }

  /**
   * Force-close every node still open, top of stack first, and move each
   * thread's outermost node into the forest. Returns how many nodes were closed.
   */
  finalize(): number {
    let forced = 0;
    for (const stack of this.stacks.values()) {
      while (stack.length) {
        const node = stack.pop()!;
        if (node.end === undefined) {
          node.end = node.start;
          forced++;
        }
        if (!stack.length) this.roots.push(node);
      }
    }
    return forced;
  }

  openDepth(threadId: ThreadId): number {
    return this.stacks.get(threadId)?.length ?? 0;
  }

  threadIds(): ThreadId[] {
    return Array.from(this.stacks.keys());
  }

  private open(threadId: ThreadId, instant: Instant, name: string): void {
    let stack = this.stacks.get(threadId);
    if (!stack) {
      stack = [];
      this.stacks.set(threadId, stack);
    }
    const node = createTraceNode(name, instant, threadId);
    const top = stack[stack.length - 1];
    if (top) {
      top.children.push(node);
      node.parent = top;
    }
    stack.push(node);
  }

  private close(threadId: ThreadId, instant: Instant, name: string): boolean {
    const stack = this.stacks.get(threadId);
    const top = stack?.[stack.length - 1];
    if (!stack || !top || top.name !== name) return false;
    top.end = instant;
    stack.pop();
    if (!stack.length) this.roots.push(top);
    return true;
  }
}
