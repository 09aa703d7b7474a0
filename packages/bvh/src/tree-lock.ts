// ---------------------------------------------------------------------------
// Tree Lock: coarse reader/writer guard over the whole tree
// ---------------------------------------------------------------------------
// State lives in an Int32Array driven through Atomics:
//   [WRITER] 0 = free, 1 = held by a writer
//   [READERS] number of active readers
// The array is not shared, so each tree is guarded on its own thread only and
// the Atomics calls act as plain reads and writes. They keep the
// compare-and-swap shape a SharedArrayBuffer-backed lock would use.
// Acquisition never waits. A contended acquire throws TreeBusyError, so a
// mutation that re-enters from inside a query (for example from a result
// sink) is refused before it touches the tree.
// ---------------------------------------------------------------------------

import { TreeBusyError } from './errors.js';

const WRITER = 0;
const READERS = 1;

const UNLOCKED = 0;
const LOCKED = 1;

export class TreeLock {
  private readonly state = new Int32Array(2);

  get isWriteLocked(): boolean {
    return Atomics.load(this.state, WRITER) === LOCKED;
  }

  get readerCount(): number {
    return Atomics.load(this.state, READERS);
  }

  /** Take the exclusive side. Fails if any reader or writer is active. */
  acquireWrite(operation: string): void {
    if (Atomics.compareExchange(this.state, WRITER, UNLOCKED, LOCKED) !== UNLOCKED) {
      throw new TreeBusyError(operation, 'writer');
    }
    if (Atomics.load(this.state, READERS) > 0) {
      Atomics.store(this.state, WRITER, UNLOCKED);
      throw new TreeBusyError(operation, 'reader');
    }
  }

  releaseWrite(): void {
    Atomics.store(this.state, WRITER, UNLOCKED);
  }

  /** Take a shared slot. Fails only while a writer holds the lock. */
  acquireRead(operation: string): void {
    if (Atomics.load(this.state, WRITER) === LOCKED) {
      throw new TreeBusyError(operation, 'writer');
    }
    Atomics.add(this.state, READERS, 1);
  }

  releaseRead(): void {
    Atomics.sub(this.state, READERS, 1);
  }

  withWrite<T>(operation: string, fn: () => T): T {
    this.acquireWrite(operation);
    try {
      return fn();
    } finally {
      this.releaseWrite();
    }
  }

  withRead<T>(operation: string, fn: () => T): T {
    this.acquireRead(operation);
    try {
      return fn();
    } finally {
      this.releaseRead();
    }
  }
}
