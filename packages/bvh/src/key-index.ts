// ---------------------------------------------------------------------------
// Key Index: external key to leaf-node index
// ---------------------------------------------------------------------------
// Keys compare with SameValueZero (Map semantics): primitives by value,
// objects by identity.
// ---------------------------------------------------------------------------

export class KeyIndex<K> {
  private readonly map = new Map<K, number>();

  get size(): number {
    return this.map.size;
  }

  set(key: K, nodeIndex: number): void {
    this.map.set(key, nodeIndex);
  }

  /** Leaf index for `key`, or undefined when absent. */
  tryGet(key: K): number | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /** Returns whether the key was present. */
  remove(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  entries(): IterableIterator<[K, number]> {
    return this.map.entries();
  }
}
