/**
 * packages/core/src/runtime/tree.ts — Committed tree.
 *
 * Why: The committed tree is an arena of nodes addressed by InstanceId. A node
 * keeps its parent's id as a non-owning back-reference and lists its
 * children's ids; the map owns every node. Each pass builds a new map and
 * shares the node objects it did not touch.
 */

import type { HostProps, VNode } from "../vnode.js";
import type { InstanceId } from "./instance.js";

export type CommittedNode = Readonly<{
  instanceId: InstanceId;
  parentId: InstanceId;
  /** VNode this instance was last reconciled against. */
  vnode: VNode;
  children: readonly InstanceId[];
}>;

export type CommitTree = Readonly<{
  rootId: InstanceId;
  nodes: ReadonlyMap<InstanceId, CommittedNode>;
}>;

/** Host-visible layer: components and fragments flattened away. */
export type HostTreeNode =
  | Readonly<{
      kind: "host";
      instanceId: InstanceId;
      type: string;
      props: HostProps;
      children: readonly HostTreeNode[];
    }>
  | Readonly<{ kind: "text"; instanceId: InstanceId; text: string }>;

export function getCommittedNode(tree: CommitTree, instanceId: InstanceId): CommittedNode {
  const node = tree.nodes.get(instanceId);
  if (node === undefined) {
    throw new Error(`CommitTree: missing node for instance ${String(instanceId)}`);
  }
  return node;
}

/** Append `rootId` and all of its descendants to `out`, in pre-order. */
export function collectSubtree(
  nodes: ReadonlyMap<InstanceId, CommittedNode>,
  rootId: InstanceId,
  out: InstanceId[],
): void {
  const stack: InstanceId[] = [rootId];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    const node = nodes.get(id);
    if (node === undefined) continue;
    out.push(id);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}

function flattenInto(tree: CommitTree, instanceId: InstanceId, out: HostTreeNode[]): void {
  const node = tree.nodes.get(instanceId);
  if (node === undefined) return;
  const vnode = node.vnode;
  switch (vnode.kind) {
    case "host": {
      const children: HostTreeNode[] = [];
      for (const child of node.children) flattenInto(tree, child, children);
      out.push(
        Object.freeze({
          kind: "host",
          instanceId,
          type: vnode.type,
          props: vnode.props,
          children: Object.freeze(children),
        }),
      );
      return;
    }
    case "text":
      out.push(Object.freeze({ kind: "text", instanceId, text: vnode.text }));
      return;
    case "empty":
      return;
    default:
      for (const child of node.children) flattenInto(tree, child, out);
  }
}

/**
 * Flatten the committed tree to the host and text nodes a backend draws.
 * Top-level entries are the outermost host/text nodes in document order.
 */
export function flattenHostTree(tree: CommitTree | null): readonly HostTreeNode[] {
  if (tree === null) return Object.freeze([]);
  const out: HostTreeNode[] = [];
  flattenInto(tree, tree.rootId, out);
  return Object.freeze(out);
}
