import { describe, it, expect } from 'vitest';
import { BoundingVolume } from '../bounding-volume.js';
import { DynamicBvh, type DynamicBvhOptions } from '../dynamic-bvh.js';
import { ArenaIndexError, InvalidBoundsError, KeyNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import { NO_NODE } from '../node-arena.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function box(min: number[], max: number[]): BoundingVolume {
  return new BoundingVolume(min, max);
}

function cube(lo: number, hi: number): BoundingVolume {
  return box([lo, lo, lo], [hi, hi, hi]);
}

function makeTree<K>(options: DynamicBvhOptions = {}): DynamicBvh<K> {
  return new DynamicBvh<K>({ env: {}, validateOnMutation: true, ...options });
}

function queryAll<K>(tree: DynamicBvh<K>, volume: BoundingVolume): K[] {
  const out: K[] = [];
  tree.query(volume, out);
  return out;
}

function captureLogs() {
  const lines: string[] = [];
  const logger = createLogger('dynamic-bvh', { level: 'debug', write: (line) => lines.push(line) });
  const entries = () => lines.map((line) => JSON.parse(line));
  return { logger, entries };
}

const everything = cube(-1e6, 1e6);

// ---------------------------------------------------------------------------
// Core behaviour
// ---------------------------------------------------------------------------

describe('DynamicBvh', () => {
  it('finds an entry by its own volume after insertion', () => {
    const tree = makeTree<string>();
    tree.insert('a', box([1, 2, 3], [4, 5, 6]));
    expect(queryAll(tree, box([1, 2, 3], [4, 5, 6]))).toEqual(['a']);
    expect(tree.count).toBe(1);
  });

  it('no longer finds an entry after removal', () => {
    const tree = makeTree<number>();
    tree.insert(1, cube(0, 1));
    tree.insert(2, cube(3, 4));
    tree.remove(1);
    expect(tree.count).toBe(1);
    expect(queryAll(tree, cube(0, 1))).toEqual([]);
  });

  it('returns nothing for a disjoint query', () => {
    const tree = makeTree<number>();
    tree.insert(1, cube(0, 1));
    expect(queryAll(tree, cube(10, 11))).toEqual([]);
  });

  it('returns every overlapping entry', () => {
    const tree = makeTree<number>();
    tree.insert(1, cube(0, 1));
    tree.insert(2, cube(0.5, 1.5));
    expect(queryAll(tree, cube(0.25, 1.25)).sort()).toEqual([1, 2]);
  });

  it('replaces the volume when a key is inserted twice', () => {
    const tree = makeTree<number>();
    const a = cube(0, 1);
    const b = cube(5, 6);
    tree.insert(1, a);
    tree.insert(1, b);
    expect(queryAll(tree, a)).toEqual([]);
    expect(queryAll(tree, b)).toEqual([1]);
    expect(tree.count).toBe(1);
  });

  it('keeps distinct keys at identical volumes apart', () => {
    const tree = makeTree<string>();
    tree.insert('x', cube(0, 1));
    tree.insert('y', cube(0, 1));
    expect(queryAll(tree, cube(0, 1)).sort()).toEqual(['x', 'y']);
  });

  it('compares object keys by identity', () => {
    const tree = makeTree<{ id: number }>();
    const first = { id: 1 };
    tree.insert(first, cube(0, 1));
    tree.insert({ id: 1 }, cube(0, 1));
    expect(tree.count).toBe(2);
    expect(tree.has(first)).toBe(true);
    expect(tree.has({ id: 1 })).toBe(false);
  });

  it('appends to a set as well as an array', () => {
    const tree = makeTree<number>();
    tree.insert(1, cube(0, 1));
    tree.insert(2, cube(2, 3));
    const seen = new Set<number>([99]);
    expect(tree.query(everything, seen)).toBe(2);
    expect([...seen].sort((x, y) => x - y)).toEqual([1, 2, 99]);
  });

  it('appends without clearing what the caller already holds', () => {
    const tree = makeTree<number>();
    tree.insert(1, cube(0, 1));
    const out = [7];
    tree.query(everything, out);
    expect(out).toEqual([7, 1]);
  });

  it('moves an entry on update', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    tree.insert('b', cube(2, 3));
    tree.updateEntryBounds('a', cube(10, 11));
    expect(queryAll(tree, cube(0, 1))).toEqual([]);
    expect(queryAll(tree, cube(10, 11))).toEqual(['a']);
    expect(tree.getBounds('a')?.equals(cube(10, 11))).toBe(true);
    expect(tree.count).toBe(2);
  });

  it('reports membership and stored bounds', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    expect(tree.has('a')).toBe(true);
    expect(tree.has('b')).toBe(false);
    expect(tree.getBounds('b')).toBeUndefined();
  });

  it('reuses freed slots instead of growing', () => {
    const tree = makeTree<number>({ initialCapacity: 4 });
    tree.insert(1, cube(0, 1));
    tree.insert(2, cube(2, 3));
    tree.insert(3, cube(4, 5));
    tree.remove(3);
    tree.insert(4, cube(6, 7));
    expect(tree.capacity).toBe(8);
    tree.remove(4);
    for (let i = 0; i < 10; i++) tree.updateEntryBounds(2, cube(i, i + 1));
    expect(tree.capacity).toBe(8);
  });
});

// ---------------------------------------------------------------------------
// Clear
// ---------------------------------------------------------------------------

describe('DynamicBvh.clear', () => {
  it('is a no-op on an empty tree', () => {
    const { logger, entries } = captureLogs();
    const tree = makeTree<number>({ logger });
    tree.clear();
    expect(tree.count).toBe(0);
    expect(tree.rootIndex).toBe(NO_NODE);
    expect(entries()).toEqual([]);
  });

  it('empties a populated tree and keeps its capacity', () => {
    const { logger, entries } = captureLogs();
    const tree = makeTree<number>({ logger, initialCapacity: 16 });
    tree.insert(1, cube(0, 1));
    tree.insert(2, cube(2, 3));
    tree.insert(3, cube(4, 5));
    tree.clear();

    expect(tree.count).toBe(0);
    expect(tree.capacity).toBe(16);
    expect(queryAll(tree, everything)).toEqual([]);
    expect(tree.has(1)).toBe(false);
    expect(entries().map((e) => [e.msg, e.released])).toEqual([['tree cleared', 3]]);

    tree.insert(4, cube(0, 1));
    expect(queryAll(tree, everything)).toEqual([4]);
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('DynamicBvh errors', () => {
  it('reports an unknown key on remove and update', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    expect(() => tree.remove('ghost')).toThrow(KeyNotFoundError);
    expect(() => tree.updateEntryBounds('ghost', cube(0, 1))).toThrow('Key not found: ghost');
    expect(tree.count).toBe(1);
  });

  it('rejects a volume of the wrong dimension before mutating', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    const flat = box([0, 0], [1, 1]);
    expect(() => tree.insert('b', flat)).toThrow('Expected 3 axes, got 2');
    expect(() => tree.updateEntryBounds('a', flat)).toThrow(InvalidBoundsError);
    expect(() => tree.query(flat, [])).toThrow(InvalidBoundsError);
    expect(tree.count).toBe(1);
    expect(tree.getBounds('a')?.equals(cube(0, 1))).toBe(true);
  });

  it('rejects undefined keys', () => {
    const tree = makeTree<string | undefined>();
    expect(() => tree.insert(undefined, cube(0, 1))).toThrow(TypeError);
    expect(tree.count).toBe(0);
  });

  it('fails fast when inspecting a free slot', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    expect(() => tree.inspectNode(5)).toThrow(ArenaIndexError);
  });

  it('rejects invalid settings', () => {
    expect(() => makeTree<string>({ dimensions: 0 })).toThrow('Invalid tree settings');
  });
});

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

describe('DynamicBvh structure', () => {
  it('turns the single leaf into the root', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    const root = tree.inspectNode(tree.rootIndex);
    expect(root.isLeaf).toBe(true);
    expect(root.value).toBe('a');
    expect(root.parent).toBe(NO_NODE);
    expect(tree.depth()).toBe(1);
  });

  it('pairs a new leaf with the cheapest sibling', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1)); // leaf 0
    tree.insert('b', box([10, 0, 0], [11, 1, 1])); // leaf 1, parent 2
    tree.insert('c', cube(0.2, 0.8)); // leaf 3, parent 4

    const root = tree.inspectNode(tree.rootIndex);
    expect(tree.rootIndex).toBe(2);
    expect(root.left).toBe(4);
    expect(root.right).toBe(1);
    expect(root.subtreeSize).toBe(2);
    expect(root.bounds.equals(box([0, 0, 0], [11, 1, 1]))).toBe(true);

    const pair = tree.inspectNode(4);
    expect([pair.left, pair.right]).toEqual([0, 3]);
    expect(pair.parent).toBe(2);
    expect(pair.subtreeSize).toBe(1);
    expect(tree.depth()).toBe(3);
  });

  it('descends into the smaller subtree when costs tie', () => {
    const tree = makeTree<string>({ balanceThreshold: 10 });
    tree.insert('a', cube(0, 2));
    tree.insert('b', cube(0, 2));
    tree.insert('c', cube(0, 2)); // ties at the root, equal sizes: goes left
    tree.insert('d', cube(0.5, 1.5)); // ties again: left now has 1 internal node

    const root = tree.inspectNode(tree.rootIndex);
    expect(root.left).toBe(4);
    expect(root.right).toBe(6);
    expect(tree.inspectNode(6).left).toBe(1);
    expect(tree.inspectNode(6).right).toBe(5);
  });

  it('follows cost while sibling sizes stay within the balance threshold', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    tree.insert('b', box([10, 0, 0], [11, 1, 1]));
    tree.insert('c', cube(0.2, 0.8));
    tree.insert('d', cube(0.1, 0.9)); // leaf 5, parent 6, next to 'a'

    expect(tree.inspectNode(5).parent).toBe(6);
    expect(tree.inspectNode(6).left).toBe(0);
    expect(tree.inspectNode(6).parent).toBe(4);
  });

  it('overrides cost once sibling sizes drift past the balance threshold', () => {
    const tree = makeTree<string>({ balanceThreshold: 0 });
    tree.insert('a', cube(0, 1));
    tree.insert('b', box([10, 0, 0], [11, 1, 1]));
    tree.insert('c', cube(0.2, 0.8));
    tree.insert('d', cube(0.1, 0.9)); // sizes 1 vs 0: forced right next to 'b'

    const root = tree.inspectNode(tree.rootIndex);
    expect(root.right).toBe(6);
    expect(tree.inspectNode(6).left).toBe(1);
    expect(tree.inspectNode(6).right).toBe(5);
  });

  it('promotes the sibling when a leaf is removed', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    tree.insert('b', box([10, 0, 0], [11, 1, 1]));
    tree.insert('c', cube(0.2, 0.8));
    tree.remove('c');

    const root = tree.inspectNode(2);
    expect([root.left, root.right]).toEqual([0, 1]);
    expect(root.subtreeSize).toBe(1);
    expect(tree.inspectNode(0).parent).toBe(2);

    tree.remove('b');
    expect(tree.rootIndex).toBe(0);
    expect(tree.inspectNode(0).parent).toBe(NO_NODE);

    tree.remove('a');
    expect(tree.rootIndex).toBe(NO_NODE);
    expect(tree.depth()).toBe(0);
  });

  it('hands out copies of node fields', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    tree.insert('b', cube(2, 3));
    const info = tree.inspectNode(tree.rootIndex);
    info.left = 42;
    expect(tree.inspectNode(tree.rootIndex).left).toBe(0);
    tree.validate();
  });

  it('logs arena growth', () => {
    const { logger, entries } = captureLogs();
    const tree = makeTree<number>({ logger, initialCapacity: 1 });
    tree.insert(1, cube(0, 1));
    tree.insert(2, cube(2, 3));
    expect(entries().map((e) => [e.msg, e.from, e.to])).toEqual([
      ['arena grown', 1, 2],
      ['arena grown', 2, 4],
    ]);
  });

  it('grows ahead of a bulk load', () => {
    const tree = makeTree<number>();
    tree.ensureCapacity(100);
    expect(tree.capacity).toBe(128);
  });
});

// ---------------------------------------------------------------------------
// Depth
// ---------------------------------------------------------------------------

describe('DynamicBvh depth', () => {
  const N = 1000;
  const bound = 2.5 * Math.log2(N);

  function maxSiblingGap<K>(tree: DynamicBvh<K>): number {
    let gap = 0;
    const stack = [tree.rootIndex];
    while (stack.length > 0) {
      const node = tree.inspectNode(stack.pop()!);
      if (node.isLeaf) continue;
      const left = tree.inspectNode(node.left);
      const right = tree.inspectNode(node.right);
      gap = Math.max(gap, Math.abs(left.subtreeSize - right.subtreeSize));
      stack.push(node.left, node.right);
    }
    return gap;
  }

  it('stays logarithmic under sequential insertion', () => {
    const tree = makeTree<number>({ validateOnMutation: false });
    for (let i = 0; i < N; i++) tree.insert(i, box([i, 0, 0], [i + 1, 1, 1]));
    tree.validate();
    expect(tree.count).toBe(N);
    expect(tree.depth()).toBeLessThan(bound);
    expect(maxSiblingGap(tree)).toBeLessThanOrEqual(3);
  });

  it('stays logarithmic under scrambled insertion', () => {
    const tree = makeTree<number>({ validateOnMutation: false });
    // 7919 is prime, so i * 7919 mod N visits every slot once
    for (let i = 0; i < N; i++) {
      const x = (i * 7919) % N;
      tree.insert(x, box([x, x % 7, 0], [x + 2, (x % 7) + 1, 1]));
    }
    tree.validate();
    expect(tree.depth()).toBeLessThan(bound);
    expect(maxSiblingGap(tree)).toBeLessThanOrEqual(3);
  });
});

// ---------------------------------------------------------------------------
// Raycast
// ---------------------------------------------------------------------------

describe('DynamicBvh.raycast', () => {
  function twoBoxes(): DynamicBvh<string> {
    const tree = makeTree<string>();
    tree.insert('near', cube(0, 1));
    tree.insert('far', box([5, 0, 0], [6, 1, 1]));
    return tree;
  }

  it('returns the nearest hit with its entry distance', () => {
    expect(twoBoxes().raycast([-1, 0.5, 0.5], [1, 0, 0])).toEqual({ key: 'near', distance: 1 });
  });

  it('hits the far box from the other side', () => {
    expect(twoBoxes().raycast([8, 0.5, 0.5], [-1, 0, 0])).toEqual({ key: 'far', distance: 2 });
  });

  it('measures distance in multiples of the direction', () => {
    expect(twoBoxes().raycast([-1, 0.5, 0.5], [2, 0, 0])).toEqual({ key: 'near', distance: 0.5 });
  });

  it('reports distance 0 from inside a box', () => {
    expect(twoBoxes().raycast([0.5, 0.5, 0.5], [1, 0, 0])).toEqual({ key: 'near', distance: 0 });
  });

  it('misses when pointing away or stopping short', () => {
    const tree = twoBoxes();
    expect(tree.raycast([-1, 0.5, 0.5], [-1, 0, 0])).toBeNull();
    expect(tree.raycast([-1, 0.5, 0.5], [1, 0, 0], 0.5)).toBeNull();
    expect(tree.raycast([-1, 5, 0.5], [1, 0, 0])).toBeNull();
  });

  it('returns null on an empty tree', () => {
    expect(makeTree<string>().raycast([0, 0, 0], [1, 0, 0])).toBeNull();
  });

  it('validates the ray', () => {
    const tree = twoBoxes();
    expect(() => tree.raycast([0, 0, 0], [0, 0, 0])).toThrow('Ray direction must be non-zero');
    expect(() => tree.raycast([0, 0], [1, 0])).toThrow('Ray origin and direction need 3 axes');
    expect(() => tree.raycast([0, NaN, 0], [1, 0, 0])).toThrow(InvalidBoundsError);
    expect(() => tree.raycast([0, 0, 0], [1, 0, 0], -1)).toThrow(InvalidBoundsError);
  });
});

// ---------------------------------------------------------------------------
// Overlapping pairs
// ---------------------------------------------------------------------------

describe('DynamicBvh.queryPairs', () => {
  function normalize(pairs: Array<[string, string]>): string[] {
    return pairs.map(([a, b]) => (a < b ? `${a}-${b}` : `${b}-${a}`)).sort();
  }

  it('reports each overlapping pair once', () => {
    const tree = makeTree<string>();
    tree.insert('a', cube(0, 1));
    tree.insert('b', cube(0.5, 1.5));
    tree.insert('c', cube(10, 11));
    tree.insert('d', cube(1, 2));
    expect(normalize(tree.queryPairs())).toEqual(['a-b', 'a-d', 'b-d']);
  });

  it('finds nothing in a tree of one or none', () => {
    const tree = makeTree<string>();
    expect(tree.queryPairs()).toEqual([]);
    tree.insert('a', cube(0, 1));
    expect(tree.queryPairs()).toEqual([]);
  });
});
