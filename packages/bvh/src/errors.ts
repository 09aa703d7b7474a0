// ---------------------------------------------------------------------------
// Error taxonomy for the dynamic BVH
// ---------------------------------------------------------------------------
// Invalid input and unknown keys are recoverable and leave the tree untouched.
// Arena and invariant errors mean the structure is already broken.
// ---------------------------------------------------------------------------

/** Base class for every error raised by the tree packages. */
export class BvhError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BvhError';
  }
}

/** Malformed volume: inverted axis, non-finite coordinate or wrong dimension. */
export class InvalidBoundsError extends BvhError {
  constructor(
    message: string,
    public readonly axis: number = -1,
  ) {
    super(message);
    this.name = 'InvalidBoundsError';
  }
}

/** Remove or update of a key the tree does not hold. */
export class KeyNotFoundError extends BvhError {
  constructor(public readonly key: unknown) {
    super(`Key not found: ${String(key)}`);
    this.name = 'KeyNotFoundError';
  }
}

/** Access to an arena slot that is out of range or not allocated. */
export class ArenaIndexError extends BvhError {
  constructor(
    public readonly index: number,
    public readonly reason: 'out-of-range' | 'not-allocated' | 'double-free',
  ) {
    super(`Arena slot ${index} rejected: ${reason}`);
    this.name = 'ArenaIndexError';
  }
}

/** A structural invariant failed during validation. */
export class InvariantViolationError extends BvhError {
  constructor(
    message: string,
    public readonly nodeIndex: number,
  ) {
    super(`Invariant violated at node ${nodeIndex}: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

/** The tree lock is held by another operation. */
export class TreeBusyError extends BvhError {
  constructor(
    public readonly operation: string,
    public readonly heldBy: 'reader' | 'writer',
  ) {
    super(`Cannot ${operation}: tree is locked by an active ${heldBy}`);
    this.name = 'TreeBusyError';
  }
}

/** A snapshot failed schema validation on restore. */
export class SnapshotFormatError extends BvhError {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid tree snapshot: ${issues.join('; ')}`);
    this.name = 'SnapshotFormatError';
  }
}
