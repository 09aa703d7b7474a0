// ---------------------------------------------------------------------------
// Node Arena: index-stable pool of tree nodes
// ---------------------------------------------------------------------------
// Slots are addressed by integer index and recycled through a free list.
// Growth appends slots and never moves a live node to another index.
// ---------------------------------------------------------------------------

import type { BoundingVolume } from './bounding-volume.js';
import { ArenaIndexError } from './errors.js';
import type { Logger } from './logger.js';

/** Index sentinel for "no node" (empty root, missing parent or child). */
export const NO_NODE = -1;

export interface ArenaNode<K> {
  value: K | undefined;
  bounds: BoundingVolume | null;
  parent: number;
  left: number;
  right: number;
  isLeaf: boolean;
  /** Internal nodes strictly below this one; always 0 for leaves. */
  subtreeSize: number;
  allocated: boolean;
}

/** An allocated slot; bounds are always present. */
export interface LiveNode<K> extends ArenaNode<K> {
  bounds: BoundingVolume;
  allocated: true;
}

export interface NodeInit<K> {
  value?: K;
  bounds: BoundingVolume;
  isLeaf: boolean;
  parent?: number;
  left?: number;
  right?: number;
  subtreeSize?: number;
}

export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

function emptySlot<K>(): ArenaNode<K> {
  return {
    value: undefined,
    bounds: null,
    parent: NO_NODE,
    left: NO_NODE,
    right: NO_NODE,
    isLeaf: false,
    subtreeSize: 0,
    allocated: false,
  };
}

function isLive<K>(slot: ArenaNode<K>): slot is LiveNode<K> {
  return slot.allocated && slot.bounds !== null;
}

function resetSlot<K>(slot: ArenaNode<K>): void {
  slot.value = undefined;
  slot.bounds = null;
  slot.parent = NO_NODE;
  slot.left = NO_NODE;
  slot.right = NO_NODE;
  slot.isLeaf = false;
  slot.subtreeSize = 0;
  slot.allocated = false;
}

export class NodeArena<K> {
  private readonly slots: ArenaNode<K>[] = [];
  private freeList: number[] = [];
  /** One past the highest index ever handed out since the last reset. */
  private peak = 0;
  private liveCount = 0;

  constructor(
    initialCapacity: number,
    private readonly logger?: Logger,
  ) {
    this.appendSlots(nextPowerOfTwo(Math.max(1, initialCapacity | 0)));
  }

  get capacity(): number {
    return this.slots.length;
  }

  /** Number of allocated slots. */
  get size(): number {
    return this.liveCount;
  }

  get peakIndex(): number {
    return this.peak;
  }

  /** Take a slot, preferring recycled indices, and fill it from `init`. */
  allocate(init: NodeInit<K>): number {
    let index = this.freeList.pop();
    if (index === undefined) {
      if (this.peak >= this.slots.length) this.grow(this.slots.length * 2);
      index = this.peak++;
    }
    this.fill(this.slotAt(index), init);
    this.liveCount++;
    return index;
  }

  free(index: number): void {
    const slot = this.slotAt(index);
    if (!slot.allocated) throw new ArenaIndexError(index, 'double-free');
    resetSlot(slot);
    this.freeList.push(index);
    this.liveCount--;
  }

  /** Live node at `index`; fails fast on a free or out-of-range slot. */
  get(index: number): LiveNode<K> {
    const slot = this.slotAt(index);
    if (!isLive(slot)) throw new ArenaIndexError(index, 'not-allocated');
    return slot;
  }

  /** Allocated slots in ascending index order. */
  *live(): Generator<[number, LiveNode<K>]> {
    for (let i = 0; i < this.peak; i++) {
      const slot = this.slots[i]!;
      if (isLive(slot)) yield [i, slot];
    }
  }

  isAllocated(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.slots.length
      && this.slots[index]!.allocated;
  }

  ensureCapacity(capacity: number): void {
    const target = nextPowerOfTwo(capacity);
    if (target > this.slots.length) this.grow(target);
  }

  /** Free every slot logically. Capacity is kept. */
  reset(): void {
    for (let i = 0; i < this.peak; i++) resetSlot(this.slots[i]!);
    this.freeList = [];
    this.peak = 0;
    this.liveCount = 0;
  }

  /**
   * Replace the arena contents with nodes at fixed indices. Unlisted indices
   * below the highest restored one become free slots.
   */
  restore(entries: ReadonlyArray<{ index: number; node: NodeInit<K> }>): void {
    this.reset();
    let highest = NO_NODE;
    for (const { index } of entries) {
      if (!Number.isInteger(index) || index < 0) throw new ArenaIndexError(index, 'out-of-range');
      if (index > highest) highest = index;
    }
    this.ensureCapacity(highest + 1);

    for (const { index, node } of entries) {
      const slot = this.slots[index]!;
      if (slot.allocated) throw new ArenaIndexError(index, 'double-free');
      this.fill(slot, node);
    }
    this.peak = highest + 1;
    this.liveCount = entries.length;
    for (let i = this.peak - 1; i >= 0; i--) {
      if (!this.slots[i]!.allocated) this.freeList.push(i);
    }
  }

  private fill(slot: ArenaNode<K>, init: NodeInit<K>): void {
    slot.value = init.value;
    slot.bounds = init.bounds;
    slot.isLeaf = init.isLeaf;
    slot.parent = init.parent ?? NO_NODE;
    slot.left = init.left ?? NO_NODE;
    slot.right = init.right ?? NO_NODE;
    slot.subtreeSize = init.isLeaf ? 0 : (init.subtreeSize ?? 1);
    slot.allocated = true;
  }

  private slotAt(index: number): ArenaNode<K> {
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
      throw new ArenaIndexError(index, 'out-of-range');
    }
    return this.slots[index]!;
  }

  private grow(capacity: number): void {
    const from = this.slots.length;
    this.appendSlots(capacity - from);
    this.logger?.debug('arena grown', { from, to: this.slots.length });
  }

  private appendSlots(count: number): void {
    for (let i = 0; i < count; i++) this.slots.push(emptySlot<K>());
  }
}
