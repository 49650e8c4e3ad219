/**
 * Watch operation flags.
 *
 * The helper reports the kind of change as a 5-bit mask. Bit order, from the
 * most significant of the five bits to the least:
 *
 *   chmod (16) | rename (8) | remove (4) | write (2) | create (1)
 */

export type WatchOp = 'create' | 'write' | 'remove' | 'rename' | 'chmod';

export const WATCH_OP_BITS: Readonly<Record<WatchOp, number>> = {
  create: 1 << 0,
  write: 1 << 1,
  remove: 1 << 2,
  rename: 1 << 3,
  chmod: 1 << 4,
};

/** All flags, most significant bit first. */
export const WATCH_OPS: readonly WatchOp[] = ['chmod', 'rename', 'remove', 'write', 'create'];

export const MAX_OP_MASK = 0b11111;

export function decodeOps(mask: number): Set<WatchOp> {
  if (!Number.isInteger(mask) || mask < 0 || mask > MAX_OP_MASK) {
    throw new RangeError(`Op mask must be an integer between 0 and ${MAX_OP_MASK}, got ${mask}`);
  }

  const ops = new Set<WatchOp>();
  for (const op of WATCH_OPS) {
    if ((mask & WATCH_OP_BITS[op]) !== 0) {
      ops.add(op);
    }
  }
  return ops;
}

export function encodeOps(ops: Iterable<WatchOp>): number {
  let mask = 0;
  for (const op of ops) {
    mask |= WATCH_OP_BITS[op];
  }
  return mask;
}
