/**
 * packages/core/src/runtime/instance.ts — Instance identifiers.
 *
 * Why: Every committed node gets a stable integer handle. The commit tree
 * addresses nodes by these handles, and a child refers to its parent by
 * handle only.
 */

/** Stable integer handle of a committed node. */
export type InstanceId = number;

/** Parent id used for the root node's position. */
export const ROOT_PARENT_ID: InstanceId = 0;

export type InstanceIdAllocator = Readonly<{
  allocate: () => InstanceId;
  /** Last id handed out (0 when none). */
  peek: () => InstanceId;
}>;

/** Create a monotonically increasing allocator starting at `start` (default 1). */
export function createInstanceIdAllocator(start = 1): InstanceIdAllocator {
  let next = start;
  return Object.freeze({
    allocate(): InstanceId {
      const id = next;
      next++;
      return id;
    },
    peek(): InstanceId {
      return next - 1;
    },
  });
}
