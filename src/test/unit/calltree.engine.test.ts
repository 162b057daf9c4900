import assert from 'assert/strict';
import { CallStackEngine, countNodes, durationMs, selfTimeMs, walkPreOrder } from '../../shared/callTree';
import type { TraceNode } from '../../shared/callTree';
import { end, eventDef, start } from './fixtures';

const A = eventDef('A');
const B = eventDef('B');

suite('callTree.engine', () => {
  test('builds a nested tree from a balanced sequence', () => {
    const engine = new CallStackEngine();
    assert.equal(engine.observe(1, 0, start(A)), 'opened');
    assert.equal(engine.observe(1, 1, start(B)), 'opened');
    assert.equal(engine.observe(1, 5, end(B)), 'closed');
    assert.equal(engine.observe(1, 10, end(A)), 'closed');
    assert.equal(engine.finalize(), 0);

    assert.equal(engine.forest.length, 1);
    const root = engine.forest[0]!;
    assert.equal(root.name, 'A');
    assert.equal(durationMs(root), 10);
    assert.equal(selfTimeMs(root), 6);
    assert.equal(root.children.length, 1);
    const child = root.children[0]!;
    assert.equal(child.name, 'B');
    assert.equal(durationMs(child), 4);
    assert.equal(selfTimeMs(child), 4);
    assert.equal(child.parent, root);
    assert.equal(root.parent, undefined);
    assert.equal(engine.openDepth(1), 0);
  });

  test('force-closes an unterminated event with zero duration', () => {
    const engine = new CallStackEngine();
    engine.observe(1, 0, start(A));
    assert.equal(engine.forest.length, 0);
    assert.equal(engine.finalize(), 1);
    assert.equal(engine.forest.length, 1);
    const root = engine.forest[0]!;
    assert.equal(root.start, 0);
    assert.equal(root.end, 0);
    assert.equal(durationMs(root), 0);
  });

  test('keeps threads independent', () => {
    const engine = new CallStackEngine();
    engine.observe(1, 0, start(A));
    engine.observe(2, 1, start(A));
    engine.observe(1, 2, end(A));
    engine.observe(2, 4, end(A));
    engine.finalize();

    assert.equal(engine.forest.length, 2);
    const [first, second] = engine.forest;
    assert.equal(first!.threadId, 1);
    assert.equal(durationMs(first!), 2);
    assert.equal(first!.children.length, 0);
    assert.equal(second!.threadId, 2);
    assert.equal(durationMs(second!), 3);
    assert.equal(second!.children.length, 0);
  });

  test('discards an end whose name is not on top of the stack', () => {
    const engine = new CallStackEngine();
    engine.observe(1, 0, start(A));
    engine.observe(1, 1, start(B));
    assert.equal(engine.observe(1, 2, end(A)), 'discarded');
    assert.equal(engine.openDepth(1), 2);
    assert.equal(engine.forest.length, 0);

    assert.equal(engine.observe(1, 3, end(B)), 'closed');
    assert.equal(engine.observe(1, 4, end(A)), 'closed');
    assert.equal(engine.forest.length, 1);
    assert.equal(durationMs(engine.forest[0]!), 4);
  });

  test('discards an end on a thread that never started anything', () => {
    const engine = new CallStackEngine();
    assert.equal(engine.observe(9, 0, end(A)), 'discarded');
    assert.deepEqual(engine.threadIds(), []);
    assert.equal(engine.finalize(), 0);
    assert.equal(engine.forest.length, 0);
  });

  test('discards an end once the thread stack is empty again', () => {
    const engine = new CallStackEngine();
    engine.observe(1, 0, start(A));
    engine.observe(1, 1, end(A));
    assert.equal(engine.observe(1, 2, end(A)), 'discarded');
    assert.equal(engine.forest.length, 1);
    assert.equal(engine.forest[0]!.end, 1);
  });

  test('supports re-entrant events of the same name', () => {
    const engine = new CallStackEngine();
    engine.observe(1, 0, start(A));
    engine.observe(1, 1, start(A));
    engine.observe(1, 2, end(A));
    engine.observe(1, 3, end(A));

    assert.equal(engine.forest.length, 1);
    const outer = engine.forest[0]!;
    assert.equal(durationMs(outer), 3);
    assert.equal(outer.children.length, 1);
    assert.equal(durationMs(outer.children[0]!), 1);
    assert.equal(selfTimeMs(outer), 2);
  });

  test('finalize closes every open frame once and is idempotent', () => {
    const engine = new CallStackEngine();
    engine.observe(1, 0, start(A));
    engine.observe(1, 2, start(B));
    assert.equal(engine.finalize(), 2);
    assert.equal(engine.forest.length, 1);
    const root = engine.forest[0]!;
    assert.equal(root.end, 0);
    assert.equal(root.children[0]!.end, 2);

    assert.equal(engine.finalize(), 0);
    assert.equal(engine.forest.length, 1);
  });

  test('a forced parent keeps a non-negative self time', () => {
    const engine = new CallStackEngine();
    engine.observe(1, 0, start(A));
    engine.observe(1, 1, start(B));
    engine.observe(1, 5, end(B));
    engine.finalize();
    const root = engine.forest[0]!;
    assert.equal(durationMs(root), 0);
    assert.equal(durationMs(root.children[0]!), 4);
    assert.equal(selfTimeMs(root), 0);
  });

  test('finalize appends roots in the order threads were first seen', () => {
    const engine = new CallStackEngine();
    engine.observe(7, 0, start(B));
    engine.observe(3, 1, start(A));
    engine.finalize();
    assert.deepEqual(
      engine.forest.map(n => [n.threadId, n.name]),
      [
        [7, 'B'],
        [3, 'A']
      ]
    );
  });

  test('balanced random sequences keep nesting and conserve self time', () => {
    const defs = [eventDef('A'), eventDef('B'), eventDef('C')];
    // Deterministic LCG so failures are reproducible
    let seed = 12345;
    const rand = (n: number) => {
      seed = (seed * 48271) % 2147483647;
      return seed % n;
    };

    for (let round = 0; round < 20; round++) {
      const engine = new CallStackEngine();
      const open: number[] = [];
      let t = 0;
      let pairs = 0;
      for (let step = 0; step < 60; step++) {
        t += rand(3);
        if (open.length === 0 || rand(2) === 0) {
          const idx = rand(defs.length);
          open.push(idx);
          engine.observe(1, t, start(defs[idx]!));
          pairs++;
        } else {
          const idx = open.pop()!;
          engine.observe(1, t, end(defs[idx]!));
        }
      }
      while (open.length) {
        t += rand(3);
        engine.observe(1, t, end(defs[open.pop()!]!));
      }

      assert.equal(engine.finalize(), 0);
      assert.equal(engine.openDepth(1), 0);
      assert.equal(countNodes(engine.forest), pairs);

      walkPreOrder(engine.forest, (node: TraceNode) => {
        const childSum = node.children.reduce((m, c) => m + durationMs(c), 0);
        assert.equal(selfTimeMs(node) + childSum, durationMs(node));
        assert.ok(selfTimeMs(node) >= 0);
        for (const c of node.children) assert.ok(c.start >= node.start);
      });
    }
  });
});
