// ---------------------------------------------------------------------------
// Dynamic BVH: incrementally updated bounding volume hierarchy
// ---------------------------------------------------------------------------
// Nodes live in an index-addressed arena; a key index maps each external key
// to its leaf. Insertion descends by cost with a subtree-size balance signal,
// removal collapses the leaf's parent into its sibling, and both refit every
// ancestor up to the root. Each public call runs under the tree lock: writes
// exclusive, reads shared.
// ---------------------------------------------------------------------------

import type { z } from 'zod';
import { resolveSettings, type TreeSettings } from '@dynbvh/config';

import { BoundingVolume, type Point } from './bounding-volume.js';
import {
  InvalidBoundsError,
  InvariantViolationError,
  KeyNotFoundError,
  SnapshotFormatError,
} from './errors.js';
import { KeyIndex } from './key-index.js';
import { createLogger, type Logger } from './logger.js';
import { NO_NODE, NodeArena, type LiveNode, type NodeInit } from './node-arena.js';
import {
  SNAPSHOT_VERSION,
  parseTreeSnapshot,
  type SnapshotNode,
  type TreeSnapshot,
} from './snapshot.js';
import { TreeLock } from './tree-lock.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DynamicBvhOptions extends Partial<TreeSettings> {
  /** Defaults to a JSON-lines logger at the resolved `logLevel`. */
  logger?: Logger;
  /** Environment consulted for setting overrides. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

/** Caller-owned collection that query results are appended to. */
export type ResultSink<K> = { push(key: K): unknown } | { add(key: K): unknown };

/** Copy of one node's fields, for diagnostics. */
export interface NodeInfo<K> {
  index: number;
  value: K | undefined;
  bounds: BoundingVolume;
  parent: number;
  left: number;
  right: number;
  isLeaf: boolean;
  subtreeSize: number;
}

export interface RayHit<K> {
  key: K;
  /** Ray parameter at entry, in multiples of the direction vector. */
  distance: number;
}

function appendTo<K>(sink: ResultSink<K>, key: K): void {
  if ('push' in sink) sink.push(key);
  else sink.add(key);
}

/** Relative tie test; two zero costs tie. */
function costsTied(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance * Math.max(Math.abs(a), Math.abs(b));
}

// ---------------------------------------------------------------------------
// Tree
// ---------------------------------------------------------------------------

export class DynamicBvh<K> {
  readonly settings: TreeSettings;

  private readonly logger: Logger;
  private readonly arena: NodeArena<K>;
  private readonly keys = new KeyIndex<K>();
  private readonly lock = new TreeLock();
  private root = NO_NODE;
  private leafCount = 0;

  constructor(options: DynamicBvhOptions = {}) {
    const { logger, env, ...overrides } = options;
    this.settings = resolveSettings(overrides, env ?? process.env);
    this.logger = logger ?? createLogger('dynamic-bvh', { level: this.settings.logLevel });
    this.arena = new NodeArena<K>(this.settings.initialCapacity, this.logger);
  }

  /** Number of live entries. */
  get count(): number {
    return this.leafCount;
  }

  get capacity(): number {
    return this.arena.capacity;
  }

  get rootIndex(): number {
    return this.root;
  }

  get dimensions(): number {
    return this.settings.dimensions;
  }

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  /** Insert `key` at `bounds`, replacing any entry already stored under it. */
  insert(key: K, bounds: BoundingVolume): void {
    if (key === undefined) throw new TypeError('Tree keys must not be undefined');
    this.assertDimensions(bounds);
    this.lock.withWrite('insert', () => {
      const existing = this.keys.tryGet(key);
      if (existing !== undefined) this.removeLeaf(key, existing);
      this.insertLeaf(key, bounds);
      this.afterMutation();
    });
  }

  /** Remove `key`. Throws KeyNotFoundError if it is absent. */
  remove(key: K): void {
    this.lock.withWrite('remove', () => {
      const leaf = this.keys.tryGet(key);
      if (leaf === undefined) throw new KeyNotFoundError(key);
      this.removeLeaf(key, leaf);
      this.afterMutation();
    });
  }

  /**
   * Move `key` to `bounds` by full relocation: the leaf is removed and
   * re-inserted from the root so its position reflects the new volume.
   */
  updateEntryBounds(key: K, bounds: BoundingVolume): void {
    this.assertDimensions(bounds);
    this.lock.withWrite('updateEntryBounds', () => {
      const leaf = this.keys.tryGet(key);
      if (leaf === undefined) throw new KeyNotFoundError(key);
      this.removeLeaf(key, leaf);
      this.insertLeaf(key, bounds);
      this.afterMutation();
    });
  }

  /** Drop every entry. Arena capacity is retained. */
  clear(): void {
    this.lock.withWrite('clear', () => {
      if (this.root === NO_NODE) return;
      const released = this.leafCount;
      this.resetState();
      this.logger.debug('tree cleared', { released });
    });
  }

  ensureCapacity(capacity: number): void {
    this.lock.withWrite('ensureCapacity', () => this.arena.ensureCapacity(capacity));
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * Append the key of every leaf whose volume intersects `volume` to
   * `results`. Returns how many keys were appended.
   */
  query(volume: BoundingVolume, results: ResultSink<K>): number {
    this.assertDimensions(volume);
    return this.lock.withRead('query', () => {
      if (this.root === NO_NODE) return 0;

      let appended = 0;
      const stack: number[] = [this.root];
      while (stack.length > 0) {
        const index = stack.pop()!;
        const node = this.arena.get(index);
        if (!node.bounds.intersects(volume)) continue;

        if (node.isLeaf) {
          appendTo(results, this.leafKey(node, index));
          appended++;
          continue;
        }
        stack.push(node.right, node.left);
      }
      return appended;
    });
  }

  has(key: K): boolean {
    return this.lock.withRead('has', () => this.keys.has(key));
  }

  /** Stored volume for `key`, or undefined when absent. */
  getBounds(key: K): BoundingVolume | undefined {
    return this.lock.withRead('getBounds', () => {
      const leaf = this.keys.tryGet(key);
      return leaf === undefined ? undefined : this.arena.get(leaf).bounds;
    });
  }

  /**
   * Nearest leaf hit by the ray `origin + t * direction` for `t` in
   * `[0, maxDistance]`, or null. Direction does not need to be normalized.
   */
  raycast(origin: Point, direction: Point, maxDistance = Infinity): RayHit<K> | null {
    this.assertRay(origin, direction);
    if (!(maxDistance >= 0)) {
      throw new InvalidBoundsError(`Ray length must be non-negative, got ${maxDistance}`);
    }
    return this.lock.withRead('raycast', () => {
      if (this.root === NO_NODE) return null;

      const invDir = direction.map((d) => (d === 0 ? Infinity : 1 / d));
      const best = { index: NO_NODE, t: Infinity };

      const visit = (index: number, entry: number): void => {
        if (entry >= best.t) return;
        const node = this.arena.get(index);
        if (node.isLeaf) {
          best.index = index;
          best.t = entry;
          return;
        }

        const tLeft = this.rayEntry(this.arena.get(node.left).bounds, origin, invDir, maxDistance);
        const tRight = this.rayEntry(this.arena.get(node.right).bounds, origin, invDir, maxDistance);
        // Nearer child first so the farther one is more likely to be pruned
        if (tLeft <= tRight) {
          if (tLeft < best.t) visit(node.left, tLeft);
          if (tRight < best.t) visit(node.right, tRight);
        } else {
          if (tRight < best.t) visit(node.right, tRight);
          if (tLeft < best.t) visit(node.left, tLeft);
        }
      };

      const rootEntry = this.rayEntry(this.arena.get(this.root).bounds, origin, invDir, maxDistance);
      if (rootEntry !== Infinity) visit(this.root, rootEntry);
      if (best.index === NO_NODE) return null;
      return { key: this.leafKey(this.arena.get(best.index), best.index), distance: best.t };
    });
  }

  /**
   * Every unordered pair of distinct entries whose volumes intersect,
   * each reported once.
   */
  queryPairs(): Array<[K, K]> {
    return this.lock.withRead('queryPairs', () => {
      const pairs: Array<[K, K]> = [];
      if (this.root !== NO_NODE) this.collectWithin(this.root, pairs);
      return pairs;
    });
  }

  /** Maximum root-to-leaf depth counted in nodes; 0 when empty. */
  depth(): number {
    return this.lock.withRead('depth', () => {
      if (this.root === NO_NODE) return 0;
      let max = 0;
      const stack: Array<[number, number]> = [[this.root, 1]];
      while (stack.length > 0) {
        const [index, level] = stack.pop()!;
        const node = this.arena.get(index);
        if (level > max) max = level;
        if (!node.isLeaf) stack.push([node.left, level + 1], [node.right, level + 1]);
      }
      return max;
    });
  }

  inspectNode(index: number): NodeInfo<K> {
    return this.lock.withRead('inspectNode', () => {
      const node = this.arena.get(index);
      return {
        index,
        value: node.value,
        bounds: node.bounds,
        parent: node.parent,
        left: node.left,
        right: node.right,
        isLeaf: node.isLeaf,
        subtreeSize: node.subtreeSize,
      };
    });
  }

  /** Full invariant scan. Throws InvariantViolationError on the first failure. */
  validate(): void {
    this.lock.withRead('validate', () => this.scan());
  }

  // -------------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------------

  toSnapshot(): TreeSnapshot<K> {
    return this.lock.withRead('toSnapshot', () => {
      const nodes: SnapshotNode<K>[] = [];
      for (const [index, node] of this.arena.live()) {
        const entry: SnapshotNode<K> = {
          index,
          min: [...node.bounds.min],
          max: [...node.bounds.max],
          parent: node.parent,
          left: node.left,
          right: node.right,
          leaf: node.isLeaf,
          subtreeSize: node.subtreeSize,
        };
        if (node.isLeaf) entry.key = this.leafKey(node, index);
        nodes.push(entry);
      }
      return {
        version: SNAPSHOT_VERSION,
        dimensions: this.settings.dimensions,
        root: this.root,
        count: this.leafCount,
        capacity: this.arena.capacity,
        nodes,
      };
    });
  }

  /**
   * Rebuild a tree from untrusted snapshot data. Keys are validated with
   * `keySchema`; the restored structure must pass the invariant scan.
   *
   * Nodes are renumbered densely in index order, so the arena is sized by
   * the nodes actually present. The snapshot's `capacity` is not used.
   */
  static fromSnapshot<K>(
    input: unknown,
    keySchema: z.ZodType<K, z.ZodTypeDef, unknown>,
    options: DynamicBvhOptions = {},
  ): DynamicBvh<K> {
    const snapshot = parseTreeSnapshot(input, keySchema);
    const tree = new DynamicBvh<K>({
      ...options,
      dimensions: snapshot.dimensions,
    });
    tree.lock.withWrite('fromSnapshot', () => tree.restore(snapshot));
    return tree;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private insertLeaf(key: K, bounds: BoundingVolume): void {
    const leaf = this.arena.allocate({ value: key, bounds, isLeaf: true });
    this.keys.set(key, leaf);
    this.leafCount++;

    if (this.root === NO_NODE) {
      this.root = leaf;
      return;
    }

    let siblingIndex = this.root;
    let sibling = this.arena.get(siblingIndex);
    while (!sibling.isLeaf) {
      siblingIndex = this.chooseChild(sibling, bounds);
      sibling = this.arena.get(siblingIndex);
    }

    const oldParent = sibling.parent;
    const parentIndex = this.arena.allocate({
      bounds: sibling.bounds.union(bounds),
      isLeaf: false,
      parent: oldParent,
      left: siblingIndex,
      right: leaf,
      subtreeSize: 1,
    });
    sibling.parent = parentIndex;
    this.arena.get(leaf).parent = parentIndex;

    if (oldParent === NO_NODE) {
      this.root = parentIndex;
    } else {
      this.replaceChild(oldParent, siblingIndex, parentIndex);
      this.refitFrom(oldParent);
    }
  }

  /**
   * Child of `node` to descend into for `bounds`: the smaller subtree when
   * sizes differ by more than the balance threshold, otherwise the cheaper
   * child, with cost ties going to the smaller subtree.
   */
  private chooseChild(node: LiveNode<K>, bounds: BoundingVolume): number {
    const left = this.arena.get(node.left);
    const right = this.arena.get(node.right);

    if (Math.abs(left.subtreeSize - right.subtreeSize) > this.settings.balanceThreshold) {
      return left.subtreeSize < right.subtreeSize ? node.left : node.right;
    }

    const leftCost = left.bounds.cost(bounds);
    const rightCost = right.bounds.cost(bounds);
    if (costsTied(leftCost, rightCost, this.settings.costTolerance)) {
      return left.subtreeSize <= right.subtreeSize ? node.left : node.right;
    }
    return leftCost < rightCost ? node.left : node.right;
  }

  private removeLeaf(key: K, leafIndex: number): void {
    const leaf = this.arena.get(leafIndex);
    if (leafIndex === this.root) {
      this.resetState();
      return;
    }

    const parentIndex = leaf.parent;
    const parent = this.arena.get(parentIndex);
    const siblingIndex = parent.left === leafIndex ? parent.right : parent.left;
    const sibling = this.arena.get(siblingIndex);
    const grandIndex = parent.parent;

    if (grandIndex === NO_NODE) {
      this.root = siblingIndex;
      sibling.parent = NO_NODE;
    } else {
      this.replaceChild(grandIndex, parentIndex, siblingIndex);
      sibling.parent = grandIndex;
    }

    this.arena.free(leafIndex);
    this.arena.free(parentIndex);
    this.keys.remove(key);
    this.leafCount--;

    if (grandIndex !== NO_NODE) this.refitFrom(grandIndex);
  }

  /** Recompute bounds and subtree size from `index` up to the root. */
  private refitFrom(index: number): void {
    let current = index;
    while (current !== NO_NODE) {
      const node = this.arena.get(current);
      const left = this.arena.get(node.left);
      const right = this.arena.get(node.right);
      node.bounds = left.bounds.union(right.bounds);
      node.subtreeSize = 1 + left.subtreeSize + right.subtreeSize;
      current = node.parent;
    }
  }

  private replaceChild(parentIndex: number, from: number, to: number): void {
    const parent = this.arena.get(parentIndex);
    if (parent.left === from) parent.left = to;
    else if (parent.right === from) parent.right = to;
    else throw new InvariantViolationError(`node ${from} is not a child`, parentIndex);
  }

  private resetState(): void {
    this.arena.reset();
    this.keys.clear();
    this.root = NO_NODE;
    this.leafCount = 0;
  }

  private afterMutation(): void {
    if (this.settings.validateOnMutation) this.scan();
  }

  private leafKey(node: LiveNode<K>, index: number): K {
    if (node.value === undefined) throw new InvariantViolationError('leaf has no key', index);
    return node.value;
  }

  /** Pairs among leaves below `index`. */
  private collectWithin(index: number, pairs: Array<[K, K]>): void {
    const node = this.arena.get(index);
    if (node.isLeaf) return;
    this.collectWithin(node.left, pairs);
    this.collectWithin(node.right, pairs);
    this.collectAcross(node.left, node.right, pairs);
  }

  /** Pairs with one leaf under `a` and the other under `b`. */
  private collectAcross(a: number, b: number, pairs: Array<[K, K]>): void {
    const nodeA = this.arena.get(a);
    const nodeB = this.arena.get(b);
    if (!nodeA.bounds.intersects(nodeB.bounds)) return;

    if (nodeA.isLeaf && nodeB.isLeaf) {
      pairs.push([this.leafKey(nodeA, a), this.leafKey(nodeB, b)]);
      return;
    }
    // Expand the internal side; when both are internal, the larger one
    if (nodeB.isLeaf || (!nodeA.isLeaf && nodeA.subtreeSize >= nodeB.subtreeSize)) {
      this.collectAcross(nodeA.left, b, pairs);
      this.collectAcross(nodeA.right, b, pairs);
    } else {
      this.collectAcross(a, nodeB.left, pairs);
      this.collectAcross(a, nodeB.right, pairs);
    }
  }

  /** Slab test: entry parameter of the ray into `bounds`, or Infinity on a miss. */
  private rayEntry(
    bounds: BoundingVolume,
    origin: Point,
    invDir: readonly number[],
    maxDistance: number,
  ): number {
    let tMin = 0;
    let tMax = maxDistance;
    for (let i = 0; i < bounds.dimensions; i++) {
      const o = origin[i] ?? 0;
      const inv = invDir[i] ?? Infinity;
      if (inv === Infinity) {
        // Parallel to this slab: must already lie within it
        if (o < bounds.axisMin(i) || o > bounds.axisMax(i)) return Infinity;
        continue;
      }
      let t1 = (bounds.axisMin(i) - o) * inv;
      let t2 = (bounds.axisMax(i) - o) * inv;
      if (t1 > t2) [t1, t2] = [t2, t1];
      if (t1 > tMin) tMin = t1;
      if (t2 < tMax) tMax = t2;
      if (tMin > tMax) return Infinity;
    }
    return tMin;
  }

  private restore(snapshot: TreeSnapshot<K>): void {
    const accepted: Array<{ node: SnapshotNode<K>; bounds: BoundingVolume }> = [];
    const seen = new Set<number>();
    const issues: string[] = [];

    for (const node of snapshot.nodes) {
      if (seen.has(node.index)) {
        issues.push(`node ${node.index} appears twice`);
        continue;
      }
      seen.add(node.index);
      if (node.index >= snapshot.capacity) {
        issues.push(`node ${node.index} lies beyond capacity ${snapshot.capacity}`);
        continue;
      }

      let bounds: BoundingVolume;
      try {
        bounds = new BoundingVolume(node.min, node.max);
      } catch (err) {
        if (!(err instanceof InvalidBoundsError)) throw err;
        issues.push(`node ${node.index}: ${err.message}`);
        continue;
      }
      if (bounds.dimensions !== snapshot.dimensions) {
        issues.push(`node ${node.index}: expected ${snapshot.dimensions} axes`);
        continue;
      }
      if (node.leaf && node.key === undefined) {
        issues.push(`leaf ${node.index} has no key`);
        continue;
      }

      accepted.push({ node, bounds });
    }
    if (issues.length > 0) throw new SnapshotFormatError(issues);

    accepted.sort((a, b) => a.node.index - b.node.index);
    const renumbered = new Map(accepted.map(({ node }, i): [number, number] => [node.index, i]));
    const relink = (from: number, role: string, to: number): number => {
      if (to === NO_NODE) return NO_NODE;
      const index = renumbered.get(to);
      if (index !== undefined) return index;
      issues.push(`node ${from}: ${role} ${to} is not in the snapshot`);
      return NO_NODE;
    };

    const entries = accepted.map(({ node, bounds }, index): { index: number; node: NodeInit<K> } => ({
      index,
      node: {
        value: node.key,
        bounds,
        isLeaf: node.leaf,
        parent: relink(node.index, 'parent', node.parent),
        left: relink(node.index, 'left child', node.left),
        right: relink(node.index, 'right child', node.right),
        subtreeSize: node.subtreeSize,
      },
    }));
    const root = snapshot.root === NO_NODE ? NO_NODE : renumbered.get(snapshot.root);
    if (root === undefined) issues.push(`root ${snapshot.root} is not in the snapshot`);
    if (root === undefined || issues.length > 0) throw new SnapshotFormatError(issues);

    this.resetState();
    this.arena.restore(entries);
    for (const { index, node } of entries) {
      if (!node.isLeaf || node.value === undefined) continue;
      if (this.keys.has(node.value)) {
        throw new SnapshotFormatError([`key ${String(node.value)} appears on more than one leaf`]);
      }
      this.keys.set(node.value, index);
    }
    this.root = root;
    this.leafCount = snapshot.count;

    this.scan();
    this.logger.info('tree restored from snapshot', {
      count: this.leafCount,
      capacity: this.arena.capacity,
    });
  }

  /** Invariant scan without taking the lock. */
  private scan(): void {
    try {
      this.scanStructure();
    } catch (err) {
      if (err instanceof InvariantViolationError) {
        this.logger.error('invariant violation', { node: err.nodeIndex, detail: err.message });
      }
      throw err;
    }
  }

  private scanStructure(): void {
    if (this.root === NO_NODE) {
      if (this.leafCount !== 0 || this.keys.size !== 0 || this.arena.size !== 0) {
        throw new InvariantViolationError('empty tree still holds entries', NO_NODE);
      }
      return;
    }
    if (!this.arena.isAllocated(this.root)) {
      throw new InvariantViolationError('root slot is not allocated', this.root);
    }
    if (this.arena.get(this.root).parent !== NO_NODE) {
      throw new InvariantViolationError('root has a parent', this.root);
    }

    let leaves = 0;
    const visited = new Set<number>();
    const stack: number[] = [this.root];
    while (stack.length > 0) {
      const index = stack.pop()!;
      if (visited.has(index)) {
        throw new InvariantViolationError('cycle or shared child detected', index);
      }
      visited.add(index);
      const node = this.arena.get(index);

      if (node.isLeaf) {
        leaves++;
        if (node.left !== NO_NODE || node.right !== NO_NODE) {
          throw new InvariantViolationError('leaf has children', index);
        }
        if (node.subtreeSize !== 0) {
          throw new InvariantViolationError('leaf subtree size is not 0', index);
        }
        const key = this.leafKey(node, index);
        if (this.keys.tryGet(key) !== index) {
          throw new InvariantViolationError('key index does not point at leaf', index);
        }
        continue;
      }

      if (node.left === NO_NODE || node.right === NO_NODE) {
        throw new InvariantViolationError('internal node is missing a child', index);
      }
      if (node.left === node.right) {
        throw new InvariantViolationError('both children are the same node', index);
      }
      for (const child of [node.left, node.right]) {
        if (!this.arena.isAllocated(child)) {
          throw new InvariantViolationError(`child ${child} is not allocated`, index);
        }
      }
      const left = this.arena.get(node.left);
      const right = this.arena.get(node.right);
      if (left.parent !== index || right.parent !== index) {
        throw new InvariantViolationError('child does not point back to parent', index);
      }
      if (!node.bounds.equals(left.bounds.union(right.bounds))) {
        throw new InvariantViolationError('bounds are not the union of children', index);
      }
      if (node.subtreeSize !== 1 + left.subtreeSize + right.subtreeSize) {
        throw new InvariantViolationError('subtree size is inconsistent', index);
      }
      stack.push(node.left, node.right);
    }

    if (leaves !== this.leafCount || leaves !== this.keys.size) {
      throw new InvariantViolationError(
        `reachable leaves ${leaves}, count ${this.leafCount}, keys ${this.keys.size}`,
        this.root,
      );
    }
    if (visited.size !== this.arena.size) {
      throw new InvariantViolationError(
        `${this.arena.size - visited.size} allocated nodes are unreachable`,
        this.root,
      );
    }
  }

  private assertDimensions(volume: BoundingVolume): void {
    if (volume.dimensions !== this.settings.dimensions) {
      throw new InvalidBoundsError(
        `Expected ${this.settings.dimensions} axes, got ${volume.dimensions}`,
      );
    }
  }

  private assertRay(origin: Point, direction: Point): void {
    const dims = this.settings.dimensions;
    if (origin.length !== dims || direction.length !== dims) {
      throw new InvalidBoundsError(`Ray origin and direction need ${dims} axes`);
    }
    if (!origin.every(Number.isFinite) || !direction.every(Number.isFinite)) {
      throw new InvalidBoundsError('Ray has a non-finite component');
    }
    if (direction.every((d) => d === 0)) {
      throw new InvalidBoundsError('Ray direction must be non-zero');
    }
  }
}
