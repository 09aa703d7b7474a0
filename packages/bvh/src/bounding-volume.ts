// ---------------------------------------------------------------------------
// Bounding Volume: immutable axis-aligned box in D dimensions
// ---------------------------------------------------------------------------

import { InvalidBoundsError } from './errors.js';

/** A point or extent vector; one entry per axis. */
export type Point = readonly number[];

/** Plain-data form used by snapshots and JSON output. */
export interface VolumeJSON {
  min: number[];
  max: number[];
}

/**
 * Axis-aligned bounding volume. Construction validates the box, so every
 * instance satisfies `min[i] <= max[i]` with finite coordinates.
 *
 * `volume` is the sum of squared extents. It is a monotonic cost proxy used
 * to compare insertion paths, not the geometric volume.
 */
export class BoundingVolume {
  readonly min: Point;
  readonly max: Point;
  readonly volume: number;

  constructor(min: ArrayLike<number>, max: ArrayLike<number>) {
    if (min.length === 0) {
      throw new InvalidBoundsError('Bounding volume needs at least one axis');
    }
    if (min.length !== max.length) {
      throw new InvalidBoundsError(
        `Min has ${min.length} axes but max has ${max.length}`,
      );
    }

    const lo: number[] = new Array<number>(min.length);
    const hi: number[] = new Array<number>(min.length);
    let volume = 0;
    for (let i = 0; i < min.length; i++) {
      const a = min[i];
      const b = max[i];
      if (a === undefined || b === undefined || !Number.isFinite(a) || !Number.isFinite(b)) {
        throw new InvalidBoundsError(`Axis ${i} has a non-finite coordinate`, i);
      }
      if (a > b) {
        throw new InvalidBoundsError(`Axis ${i} is inverted: min ${a} > max ${b}`, i);
      }
      lo[i] = a;
      hi[i] = b;
      const extent = b - a;
      volume += extent * extent;
    }

    this.min = Object.freeze(lo);
    this.max = Object.freeze(hi);
    this.volume = volume;
  }

  /** Box centred on `center` reaching `halfExtents` along each axis. */
  static fromCenter(center: Point, halfExtents: Point): BoundingVolume {
    if (center.length !== halfExtents.length) {
      throw new InvalidBoundsError(
        `Center has ${center.length} axes but half extents have ${halfExtents.length}`,
      );
    }
    const min = center.map((c, i) => c - (halfExtents[i] ?? 0));
    const max = center.map((c, i) => c + (halfExtents[i] ?? 0));
    return new BoundingVolume(min, max);
  }

  static fromJSON(json: VolumeJSON): BoundingVolume {
    return new BoundingVolume(json.min, json.max);
  }

  get dimensions(): number {
    return this.min.length;
  }

  get center(): number[] {
    return this.min.map((lo, i) => (lo + this.axisMax(i)) / 2);
  }

  get size(): number[] {
    return this.min.map((lo, i) => this.axisMax(i) - lo);
  }

  /** Tightest volume containing both boxes. */
  union(other: BoundingVolume): BoundingVolume {
    this.assertSameDimensions(other);
    const min = new Array<number>(this.min.length);
    const max = new Array<number>(this.min.length);
    for (let i = 0; i < this.min.length; i++) {
      min[i] = Math.min(this.axisMin(i), other.axisMin(i));
      max[i] = Math.max(this.axisMax(i), other.axisMax(i));
    }
    return new BoundingVolume(min, max);
  }

  /** Closed-interval overlap on every axis; touching faces intersect. */
  intersects(other: BoundingVolume): boolean {
    this.assertSameDimensions(other);
    for (let i = 0; i < this.min.length; i++) {
      if (this.axisMin(i) > other.axisMax(i) || this.axisMax(i) < other.axisMin(i)) {
        return false;
      }
    }
    return true;
  }

  contains(other: BoundingVolume): boolean {
    this.assertSameDimensions(other);
    for (let i = 0; i < this.min.length; i++) {
      if (other.axisMin(i) < this.axisMin(i) || other.axisMax(i) > this.axisMax(i)) {
        return false;
      }
    }
    return true;
  }

  /** Growth of this volume's cost proxy if it were extended to cover `other`. */
  cost(other: BoundingVolume): number {
    return this.union(other).volume - this.volume;
  }

  equals(other: BoundingVolume): boolean {
    if (other.dimensions !== this.dimensions) return false;
    for (let i = 0; i < this.min.length; i++) {
      if (this.axisMin(i) !== other.axisMin(i) || this.axisMax(i) !== other.axisMax(i)) {
        return false;
      }
    }
    return true;
  }

  toJSON(): VolumeJSON {
    return { min: [...this.min], max: [...this.max] };
  }

  toString(): string {
    return `Min: (${this.min.join(', ')}), Max: (${this.max.join(', ')})`;
  }

  /** Lower bound on axis `i`; axes are validated at construction. */
  axisMin(i: number): number {
    return this.min[i] ?? 0;
  }

  axisMax(i: number): number {
    return this.max[i] ?? 0;
  }

  private assertSameDimensions(other: BoundingVolume): void {
    if (other.dimensions !== this.dimensions) {
      throw new InvalidBoundsError(
        `Dimension mismatch: ${this.dimensions} axes vs ${other.dimensions}`,
      );
    }
  }
}
