/**
 * packages/core/src/runtime/reconcile.ts — Sibling list matching.
 *
 * Why: Decides, for one parent, which previous child instances survive into
 * the next render. Each child gets a slot id: `k:` plus its key when it has
 * one, `i:` plus its position otherwise, so keyed and unkeyed children never
 * match each other.
 *
 *   - same slot, same element type: the instance is reused
 *   - same slot, different type: a fresh instance replaces it
 *   - slot only in the previous list: unmounted
 *   - two siblings with one key: WEFT_DUPLICATE_KEY, never first-wins
 */

import type { WeftFatal } from "../errors.js";
import { type Key, type VNode, vnodeKey } from "../vnode.js";
import type { InstanceId, InstanceIdAllocator } from "./instance.js";

/** Slot identifier: keyed ("k:s:name", "k:n:3") or indexed ("i:0"). */
export type SlotId = `k:${string}` | `i:${number}`;

export type ReconcileFatal = WeftFatal<"WEFT_DUPLICATE_KEY">;

/** One entry of the next list. */
export type ReconciledChild = Readonly<{
  slotId: SlotId;
  vnode: VNode;
  instanceId: InstanceId;
  kind: "reused" | "new";
  prevIndex: number | null;
  /** Previous instance in the same slot whose type did not match. */
  replacedInstanceId: InstanceId | null;
}>;

export type ReconcileChildrenOk = Readonly<{
  nextChildren: readonly ReconciledChild[];
  reusedInstanceIds: readonly InstanceId[];
  newInstanceIds: readonly InstanceId[];
  /** Previous children without a reusable match, in previous order. */
  unmountedInstanceIds: readonly InstanceId[];
}>;

export type ReconcileChildrenResult =
  | Readonly<{ ok: true; value: ReconcileChildrenOk }>
  | Readonly<{ ok: false; fatal: ReconcileFatal }>;

export type PrevChild = Readonly<{ instanceId: InstanceId; vnode: VNode }>;

/** True when `next` may keep the instance that rendered `prev`. */
export function canReuseVNode(prev: VNode, next: VNode): boolean {
  switch (prev.kind) {
    case "host":
      return next.kind === "host" && next.type === prev.type;
    case "component":
      return next.kind === "component" && next.type === prev.type;
    default:
      return prev.kind === next.kind;
  }
}

function keyToken(key: Key): string {
  return typeof key === "number" ? `n:${String(key)}` : `s:${key}`;
}

/** Compute the slot ID for a child: keyed if key present, indexed otherwise. */
export function slotIdForChild(child: VNode, childIndex: number): SlotId {
  const key = vnodeKey(child);
  if (key !== undefined) return `k:${keyToken(key)}`;
  return `i:${childIndex}`;
}

function duplicateKeyDetail(
  parentInstanceId: InstanceId,
  key: Key,
  aIndex: number,
  bIndex: number,
): string {
  const shown = typeof key === "number" ? String(key) : `"${key}"`;
  return `duplicate sibling key ${shown} under parent instanceId=${String(parentInstanceId)} (child indices ${String(
    aIndex,
  )} and ${String(bIndex)})`;
}

function containsAnyKey(vnodes: Iterable<VNode>): boolean {
  for (const vnode of vnodes) {
    if (vnodeKey(vnode) !== undefined) return true;
  }
  return false;
}

function* prevVNodes(prevChildren: readonly PrevChild[]): Generator<VNode> {
  for (const prev of prevChildren) yield prev.vnode;
}

const EMPTY_INSTANCE_IDS: readonly InstanceId[] = Object.freeze([]);

function reconcileUnkeyedChildren(
  prevChildren: readonly PrevChild[],
  nextVChildren: readonly VNode[],
  allocator: InstanceIdAllocator,
): ReconcileChildrenOk {
  const prevLen = prevChildren.length;
  const nextLen = nextVChildren.length;
  const sharedLength = Math.min(prevLen, nextLen);

  const nextChildren: ReconciledChild[] = [];
  const reusedInstanceIds: InstanceId[] = [];
  const newInstanceIds: InstanceId[] = [];
  const unmountedInstanceIds: InstanceId[] = [];

  for (let i = 0; i < nextLen; i++) {
    const vnode = nextVChildren[i];
    if (!vnode) continue;
    const slotId: SlotId = `i:${i}`;
    const prev = i < sharedLength ? prevChildren[i] : undefined;
    if (prev && canReuseVNode(prev.vnode, vnode)) {
      reusedInstanceIds.push(prev.instanceId);
      nextChildren.push({
        slotId,
        vnode,
        instanceId: prev.instanceId,
        kind: "reused",
        prevIndex: i,
        replacedInstanceId: null,
      });
      continue;
    }
    if (prev) unmountedInstanceIds.push(prev.instanceId);
    const instanceId = allocator.allocate();
    newInstanceIds.push(instanceId);
    nextChildren.push({
      slotId,
      vnode,
      instanceId,
      kind: "new",
      prevIndex: null,
      replacedInstanceId: prev ? prev.instanceId : null,
    });
  }

  for (let i = sharedLength; i < prevLen; i++) {
    const prev = prevChildren[i];
    if (prev) unmountedInstanceIds.push(prev.instanceId);
  }

  return {
    nextChildren,
    reusedInstanceIds,
    newInstanceIds,
    unmountedInstanceIds:
      unmountedInstanceIds.length === 0 ? EMPTY_INSTANCE_IDS : unmountedInstanceIds,
  };
}

/**
 * Match `nextVChildren` against `prevChildren`. Fresh instance ids are taken
 * from `allocator` in next-list order; `parentInstanceId` only feeds the
 * duplicate-key diagnostic.
 */
export function reconcileChildren(
  parentInstanceId: InstanceId,
  prevChildren: readonly PrevChild[],
  nextVChildren: readonly VNode[],
  allocator: InstanceIdAllocator,
): ReconcileChildrenResult {
  if (!containsAnyKey(prevVNodes(prevChildren)) && !containsAnyKey(nextVChildren)) {
    return {
      ok: true,
      value: reconcileUnkeyedChildren(prevChildren, nextVChildren, allocator),
    };
  }

  const prevBySlotId = new Map<SlotId, number>();

  for (let i = 0; i < prevChildren.length; i++) {
    const prev = prevChildren[i];
    if (!prev) continue;
    const slotId = slotIdForChild(prev.vnode, i);
    const existing = prevBySlotId.get(slotId);
    const key = vnodeKey(prev.vnode);
    if (existing !== undefined && key !== undefined) {
      return {
        ok: false,
        fatal: {
          code: "WEFT_DUPLICATE_KEY",
          detail: duplicateKeyDetail(parentInstanceId, key, existing, i),
        },
      };
    }
    prevBySlotId.set(slotId, i);
  }

  const seenNextKeySlot = new Map<SlotId, number>();

  const usedPrev = new Array<boolean>(prevChildren.length).fill(false);
  const nextChildren: ReconciledChild[] = [];
  const reusedInstanceIds: InstanceId[] = [];
  const newInstanceIds: InstanceId[] = [];

  for (let nextIndex = 0; nextIndex < nextVChildren.length; nextIndex++) {
    const vnode = nextVChildren[nextIndex];
    if (!vnode) continue;
    const slotId = slotIdForChild(vnode, nextIndex);

    const key = vnodeKey(vnode);
    if (key !== undefined) {
      const existing = seenNextKeySlot.get(slotId);
      if (existing !== undefined) {
        return {
          ok: false,
          fatal: {
            code: "WEFT_DUPLICATE_KEY",
            detail: duplicateKeyDetail(parentInstanceId, key, existing, nextIndex),
          },
        };
      }
      seenNextKeySlot.set(slotId, nextIndex);
    }

    const prevIndex = prevBySlotId.get(slotId);
    const prevChild = prevIndex !== undefined ? prevChildren[prevIndex] : undefined;
    if (prevIndex !== undefined && prevChild !== undefined && usedPrev[prevIndex] === false) {
      usedPrev[prevIndex] = true;
      if (canReuseVNode(prevChild.vnode, vnode)) {
        reusedInstanceIds.push(prevChild.instanceId);
        nextChildren.push({
          slotId,
          vnode,
          instanceId: prevChild.instanceId,
          kind: "reused",
          prevIndex,
          replacedInstanceId: null,
        });
        continue;
      }
      const instanceId = allocator.allocate();
      newInstanceIds.push(instanceId);
      nextChildren.push({
        slotId,
        vnode,
        instanceId,
        kind: "new",
        prevIndex: null,
        replacedInstanceId: prevChild.instanceId,
      });
      continue;
    }

    const instanceId = allocator.allocate();
    newInstanceIds.push(instanceId);
    nextChildren.push({
      slotId,
      vnode,
      instanceId,
      kind: "new",
      prevIndex: null,
      replacedInstanceId: null,
    });
  }

  const reused = new Set<InstanceId>(reusedInstanceIds);
  const unmountedInstanceIds: InstanceId[] = [];
  for (const prev of prevChildren) {
    if (!reused.has(prev.instanceId)) unmountedInstanceIds.push(prev.instanceId);
  }

  return {
    ok: true,
    value: {
      nextChildren,
      reusedInstanceIds,
      newInstanceIds,
      unmountedInstanceIds,
    },
  };
}
