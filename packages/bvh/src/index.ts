// ---------------------------------------------------------------------------
// @dynbvh/bvh: dynamic bounding volume hierarchy
// ---------------------------------------------------------------------------

export { BoundingVolume } from './bounding-volume.js';
export type { Point, VolumeJSON } from './bounding-volume.js';

export { DynamicBvh } from './dynamic-bvh.js';
export type { DynamicBvhOptions, NodeInfo, RayHit, ResultSink } from './dynamic-bvh.js';

export { SerializedBvh } from './serialized-bvh.js';

export { NodeArena, NO_NODE, nextPowerOfTwo } from './node-arena.js';
export type { ArenaNode, LiveNode, NodeInit } from './node-arena.js';

export { KeyIndex } from './key-index.js';
export { TreeLock } from './tree-lock.js';

export { SNAPSHOT_VERSION, parseTreeSnapshot, treeSnapshotSchema } from './snapshot.js';
export type { SnapshotNode, TreeSnapshot } from './snapshot.js';

export { createLogger } from './logger.js';
export type { Logger, LoggerOptions, LogFields } from './logger.js';

export {
  BvhError,
  InvalidBoundsError,
  KeyNotFoundError,
  ArenaIndexError,
  InvariantViolationError,
  TreeBusyError,
  SnapshotFormatError,
} from './errors.js';
