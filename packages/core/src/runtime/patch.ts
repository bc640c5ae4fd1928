/**
 * packages/core/src/runtime/patch.ts — Patch operations.
 *
 * Why: The backend receives the difference between two committed trees as an
 * ordered list of structural operations addressed by (parentId, index) in the
 * instance tree. Replaying them in order against a copy of the previous tree
 * yields the next tree.
 *
 * Per sibling list the order is:
 *   1. remove   previous children without a match, descending old index
 *   2. reorder  survivors into their new relative order (one op, if any move)
 *   3. insert   freshly mounted children, ascending new index
 *   4. replace  same slot, different element type, at the new index
 * Operations of nested lists follow the list operations of their parent.
 */

import type { HostProps } from "../vnode.js";
import type { InstanceId } from "./instance.js";
import type { ReconciledChild } from "./reconcile.js";

export type PropDiff = Readonly<{
  set: HostProps;
  removed: readonly string[];
}>;

/**
 * A survivor moved from index `from` to index `to`, both counted among the
 * survivors only (after removes, before inserts). Survivors not listed keep
 * their relative order and fill the remaining positions.
 */
export type ReorderMove = Readonly<{
  instanceId: InstanceId;
  from: number;
  to: number;
}>;

export type PatchOp =
  | Readonly<{ kind: "remove"; parentId: InstanceId; index: number; instanceId: InstanceId }>
  | Readonly<{ kind: "reorder"; parentId: InstanceId; moves: readonly ReorderMove[] }>
  | Readonly<{ kind: "insert"; parentId: InstanceId; index: number; instanceId: InstanceId }>
  | Readonly<{
      kind: "replace";
      parentId: InstanceId;
      index: number;
      prevInstanceId: InstanceId;
      instanceId: InstanceId;
    }>
  | Readonly<{ kind: "updateProps"; instanceId: InstanceId; diff: PropDiff }>
  | Readonly<{ kind: "setText"; instanceId: InstanceId; text: string }>;

export type PatchOpKind = PatchOp["kind"];

/**
 * Diff two host prop mappings key by key with Object.is.
 * Returns null when nothing changed.
 */
export function diffProps(prev: HostProps, next: HostProps): PropDiff | null {
  const set: Record<string, unknown> = {};
  const removed: string[] = [];
  let changed = false;

  for (const [name, value] of Object.entries(next)) {
    if (!Object.hasOwn(prev, name) || !Object.is(prev[name], value)) {
      set[name] = value;
      changed = true;
    }
  }
  for (const name of Object.keys(prev)) {
    if (!Object.hasOwn(next, name)) {
      removed.push(name);
      changed = true;
    }
  }

  if (!changed) return null;
  return Object.freeze({ set: Object.freeze(set), removed: Object.freeze(removed) });
}

function survivorOf(child: ReconciledChild): InstanceId | null {
  return child.kind === "reused" ? child.instanceId : child.replacedInstanceId;
}

/**
 * Structural operations for one sibling list whose parent instance survived.
 * Moves are found in a single pass with the last-placed-index heuristic: a
 * survivor whose old position precedes the furthest one already placed moves.
 */
export function planSiblingOps(
  parentId: InstanceId,
  prevIds: readonly InstanceId[],
  nextChildren: readonly ReconciledChild[],
): PatchOp[] {
  const ops: PatchOp[] = [];

  const survivors = new Set<InstanceId>();
  for (const child of nextChildren) {
    const survivor = survivorOf(child);
    if (survivor !== null) survivors.add(survivor);
  }

  for (let i = prevIds.length - 1; i >= 0; i--) {
    const id = prevIds[i];
    if (id !== undefined && !survivors.has(id)) {
      ops.push({ kind: "remove", parentId, index: i, instanceId: id });
    }
  }

  const survivorIndex = new Map<InstanceId, number>();
  for (const id of prevIds) {
    if (survivors.has(id)) survivorIndex.set(id, survivorIndex.size);
  }

  const moves: ReorderMove[] = [];
  let lastPlaced = -1;
  let to = 0;
  for (const child of nextChildren) {
    const survivor = survivorOf(child);
    if (survivor === null) continue;
    const from = survivorIndex.get(survivor);
    if (from === undefined) continue;
    if (from < lastPlaced) {
      moves.push({ instanceId: survivor, from, to });
    } else {
      lastPlaced = from;
    }
    to++;
  }
  if (moves.length > 0) ops.push({ kind: "reorder", parentId, moves });

  for (let index = 0; index < nextChildren.length; index++) {
    const child = nextChildren[index];
    if (child !== undefined && child.kind === "new" && child.replacedInstanceId === null) {
      ops.push({ kind: "insert", parentId, index, instanceId: child.instanceId });
    }
  }

  for (let index = 0; index < nextChildren.length; index++) {
    const child = nextChildren[index];
    if (child !== undefined && child.replacedInstanceId !== null) {
      ops.push({
        kind: "replace",
        parentId,
        index,
        prevInstanceId: child.replacedInstanceId,
        instanceId: child.instanceId,
      });
    }
  }

  return ops;
}

/**
 * Apply one reorder op to a survivor list. Shared by backends that mirror the
 * tree.
 */
export function applyReorder(
  survivors: readonly InstanceId[],
  moves: readonly ReorderMove[],
): InstanceId[] {
  const out = new Array<InstanceId | undefined>(survivors.length).fill(undefined);
  const moved = new Set<InstanceId>();
  for (const move of moves) {
    out[move.to] = move.instanceId;
    moved.add(move.instanceId);
  }
  let cursor = 0;
  for (const id of survivors) {
    if (moved.has(id)) continue;
    while (out[cursor] !== undefined) cursor++;
    out[cursor] = id;
    cursor++;
  }
  const result: InstanceId[] = [];
  for (const id of out) {
    if (id !== undefined) result.push(id);
  }
  return result;
}
