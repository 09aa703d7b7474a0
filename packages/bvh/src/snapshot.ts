// ---------------------------------------------------------------------------
// Snapshot format: JSON-safe image of the node arena
// ---------------------------------------------------------------------------
// Node indices are arena indices at capture time; free slots are implied by
// their absence. Restoring renumbers the nodes densely.
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { SnapshotFormatError } from './errors.js';

export const SNAPSHOT_VERSION = 1;

export interface SnapshotNode<K> {
  index: number;
  /** Present on leaves only. */
  key?: K;
  min: number[];
  max: number[];
  parent: number;
  left: number;
  right: number;
  leaf: boolean;
  subtreeSize: number;
}

export interface TreeSnapshot<K> {
  version: typeof SNAPSHOT_VERSION;
  dimensions: number;
  root: number;
  count: number;
  capacity: number;
  nodes: SnapshotNode<K>[];
}

const nodeIndex = z.number().int().min(-1);

/** Structural schema; leaf keys are checked separately against the caller's key schema. */
export const treeSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  dimensions: z.number().int().min(1).max(16),
  root: nodeIndex,
  count: z.number().int().min(0),
  capacity: z.number().int().min(1).max(2 ** 30),
  nodes: z.array(
    z.object({
      index: z.number().int().min(0),
      key: z.unknown(),
      min: z.array(z.number()),
      max: z.array(z.number()),
      parent: nodeIndex,
      left: nodeIndex,
      right: nodeIndex,
      leaf: z.boolean(),
      subtreeSize: z.number().int().min(0),
    }),
  ),
});

/** Validate untrusted input as a snapshot. Throws SnapshotFormatError. */
export function parseTreeSnapshot<K>(
  input: unknown,
  keySchema: z.ZodType<K, z.ZodTypeDef, unknown>,
): TreeSnapshot<K> {
  const result = treeSnapshotSchema.safeParse(input);
  if (!result.success) {
    throw new SnapshotFormatError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const issues: string[] = [];
  const nodes = result.data.nodes.map((node, i): SnapshotNode<K> => {
    const { key, ...rest } = node;
    if (key === undefined) return rest;
    const parsed = keySchema.safeParse(key);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`nodes.${i}.key: ${issue.message}`);
      }
      return rest;
    }
    return { ...rest, key: parsed.data };
  });
  if (issues.length > 0) throw new SnapshotFormatError(issues);

  return { ...result.data, nodes };
}
