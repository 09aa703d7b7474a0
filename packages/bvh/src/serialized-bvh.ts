/**
 * Serialized BVH
 *
 * Async facade for many concurrent callers sharing one tree. Every operation
 * is queued on a single-lane p-queue, so operations apply one at a time in
 * submission order and the final state matches that serialization.
 */

import PQueue from 'p-queue';

import type { BoundingVolume } from './bounding-volume.js';
import { DynamicBvh, type DynamicBvhOptions } from './dynamic-bvh.js';

export class SerializedBvh<K> {
  readonly tree: DynamicBvh<K>;
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(treeOrOptions: DynamicBvh<K> | DynamicBvhOptions = {}) {
    this.tree = treeOrOptions instanceof DynamicBvh ? treeOrOptions : new DynamicBvh<K>(treeOrOptions);
  }

  /** Operations waiting or running. */
  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  insert(key: K, bounds: BoundingVolume): Promise<void> {
    return this.run(() => this.tree.insert(key, bounds));
  }

  remove(key: K): Promise<void> {
    return this.run(() => this.tree.remove(key));
  }

  updateEntryBounds(key: K, bounds: BoundingVolume): Promise<void> {
    return this.run(() => this.tree.updateEntryBounds(key, bounds));
  }

  clear(): Promise<void> {
    return this.run(() => this.tree.clear());
  }

  /** Keys intersecting `volume`, as of this operation's turn in the queue. */
  query(volume: BoundingVolume): Promise<K[]> {
    return this.run(() => {
      const results: K[] = [];
      this.tree.query(volume, results);
      return results;
    });
  }

  count(): Promise<number> {
    return this.run(() => this.tree.count);
  }

  /** Resolves once every operation submitted so far has finished. */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  private run<T>(operation: () => T): Promise<T> {
    return this.queue.add(operation, { throwOnTimeout: true });
  }
}
