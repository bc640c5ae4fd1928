/**
 * packages/core/src/runtime/commit.ts — Render pass.
 *
 * Why: Walks the new VNode tree against the committed tree depth-first,
 * re-running component render functions with their existing hook arenas,
 * and produces the next committed tree, the ordered patch for the backend,
 * the instance lifecycle report and the effects due after the commit.
 *
 * Bailout: a component is not re-rendered when it received the identical
 * VNode (or its memo comparator accepts the props) and it has no pending
 * update. Its subtree is still entered when a descendant is dirty; the
 * "dirty path" set holds every ancestor of a dirty instance.
 *
 * Context: a component's provider frames are pushed after it renders (or
 * bails out) and popped when its subtree is done. A provider whose value
 * changed marks its subscribers dirty, which extends the dirty path below it.
 */

import { formatWarning, type WarnFn, warnDev } from "../debug/warn.js";
import {
  HookOrderError,
  WeftError,
  type WeftFatal,
  describeThrown,
} from "../errors.js";
import {
  type ComponentVNode,
  type VNode,
  type VNodeChild,
  normalizeChild,
  vnodeTypeName,
} from "../vnode.js";
import { createContextFrameStack } from "./context.js";
import { type InstanceId, type InstanceIdAllocator, ROOT_PARENT_ID } from "./instance.js";
import type { HookArena, PendingEffectSlot } from "./instances.js";
import { type PatchOp, diffProps, planSiblingOps } from "./patch.js";
import { reconcileChildren } from "./reconcile.js";
import { DETACHED_SERVICES, type RuntimeServices, createRenderContext } from "./renderContext.js";
import { type CommitTree, type CommittedNode, collectSubtree } from "./tree.js";

/** Default hard limit on tree depth. */
export const DEFAULT_MAX_DEPTH = 500;
/** Depth past which a dev warning is emitted once per pass. */
const WARN_DEPTH = 200;

export type CommitOptions = Readonly<{
  allocator: InstanceIdAllocator;
  arena: HookArena;
  services?: RuntimeServices | undefined;
  maxDepth?: number | undefined;
  warn?: WarnFn | undefined;
}>;

/** Component instances whose lifecycle changed in a pass. */
export type LifecycleReport = Readonly<{
  mounted: readonly InstanceId[];
  /** Existing instances that re-rendered. */
  updated: readonly InstanceId[];
  /** Removed instances, in pre-order of the previous tree. */
  unmounted: readonly InstanceId[];
}>;

/** Effect slots an instance scheduled during its render. */
export type EffectBatch = Readonly<{
  instanceId: InstanceId;
  slots: readonly PendingEffectSlot[];
}>;

export type CommitStats = Readonly<{
  visited: number;
  rendered: number;
  skipped: number;
}>;

export type CommitOk = Readonly<{
  tree: CommitTree;
  patch: readonly PatchOp[];
  lifecycle: LifecycleReport;
  /** In the order instances rendered. */
  effects: readonly EffectBatch[];
  stats: CommitStats;
}>;

export type CommitFatal = WeftFatal;

export type CommitResult =
  | Readonly<{ ok: true; value: CommitOk }>
  | Readonly<{ ok: false; fatal: CommitFatal }>;

class CommitAbort extends Error {
  readonly fatal: CommitFatal;

  constructor(fatal: CommitFatal) {
    super(fatal.detail);
    this.fatal = fatal;
  }
}

function fatalFromThrown(e: unknown, componentName: string): CommitAbort {
  if (e instanceof CommitAbort) return e;
  if (e instanceof HookOrderError) {
    return new CommitAbort({ code: "WEFT_HOOK_ORDER", detail: e.message, error: e });
  }
  if (e instanceof WeftError) {
    return new CommitAbort({ code: e.code, detail: `<${componentName}>: ${e.message}`, error: e });
  }
  return new CommitAbort({
    code: "WEFT_USER_CODE_THROW",
    detail: `<${componentName}> threw during render: ${describeThrown(e)}`,
  });
}

/**
 * Reconcile `root` against the previous committed tree.
 *
 * The returned tree becomes the baseline only once the caller has applied the
 * patch; effects are not run here.
 */
export function commitRender(
  prev: CommitTree | null,
  root: VNode,
  opts: CommitOptions,
): CommitResult {
  const { allocator, arena } = opts;
  const services = opts.services ?? DETACHED_SERVICES;
  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  const warn = opts.warn ?? warnDev;

  const prevNodes: ReadonlyMap<InstanceId, CommittedNode> = prev?.nodes ?? new Map();
  const nodes = new Map<InstanceId, CommittedNode>(prevNodes);
  const patch: PatchOp[] = [];
  const mounted: InstanceId[] = [];
  const updated: InstanceId[] = [];
  const unmounted: InstanceId[] = [];
  const effects: EffectBatch[] = [];
  const frames = createContextFrameStack();
  const dirtyPath = new Set<InstanceId>();
  let visited = 0;
  let rendered = 0;
  let skipped = 0;
  let warnedDepth = false;

  function markPath(instanceId: InstanceId): void {
    let current = instanceId;
    while (!dirtyPath.has(current)) {
      dirtyPath.add(current);
      const node = prevNodes.get(current);
      if (node === undefined || !prevNodes.has(node.parentId)) return;
      current = node.parentId;
    }
  }

  for (const id of arena.dirtyIds()) {
    if (prevNodes.has(id)) markPath(id);
  }

  function prevNode(instanceId: InstanceId): CommittedNode {
    const node = prevNodes.get(instanceId);
    if (node === undefined) {
      throw new Error(`commitRender: missing previous node ${String(instanceId)}`);
    }
    return node;
  }

  function unmountSubtree(instanceId: InstanceId): void {
    const ids: InstanceId[] = [];
    collectSubtree(prevNodes, instanceId, ids);
    for (const id of ids) {
      if (prevNodes.get(id)?.vnode.kind === "component") unmounted.push(id);
      nodes.delete(id);
    }
  }

  function pushFrames(instanceId: InstanceId): number {
    const provided = arena.providerFrames(instanceId);
    for (const frame of provided) frames.push(frame);
    return provided.length;
  }

  function renderComponent(instanceId: InstanceId, vnode: ComponentVNode): VNode {
    let output: VNodeChild;
    let pending: readonly PendingEffectSlot[];
    try {
      const hooks = arena.beginRender(instanceId, frames);
      output = vnode.render(createRenderContext(hooks, services, instanceId, vnode.name));
      pending = arena.endRender(instanceId);
    } catch (e: unknown) {
      throw fatalFromThrown(e, vnode.name);
    }
    rendered++;
    if (pending.length > 0) effects.push({ instanceId, slots: pending });

    for (const frame of arena.takeChangedProviders(instanceId)) {
      for (const subscriber of frame.subscribers) {
        if (!arena.has(subscriber) || !prevNodes.has(subscriber)) {
          frame.subscribers.delete(subscriber);
          continue;
        }
        arena.invalidate(subscriber);
        markPath(subscriber);
      }
    }

    try {
      return normalizeChild(output);
    } catch (e: unknown) {
      throw fatalFromThrown(e, vnode.name);
    }
  }

  function visitList(
    parentId: InstanceId,
    prevIds: readonly InstanceId[],
    nextVNodes: readonly VNode[],
    depth: number,
    emitOps: boolean,
  ): InstanceId[] {
    const prevChildren = prevIds.map((instanceId) => ({
      instanceId,
      vnode: prevNode(instanceId).vnode,
    }));
    const res = reconcileChildren(parentId, prevChildren, nextVNodes, allocator);
    if (!res.ok) throw new CommitAbort(res.fatal);

    for (const id of res.value.unmountedInstanceIds) unmountSubtree(id);
    if (emitOps) {
      for (const op of planSiblingOps(parentId, prevIds, res.value.nextChildren)) patch.push(op);
    }

    const ids: InstanceId[] = [];
    for (const child of res.value.nextChildren) {
      visited++;
      const childDepth = depth + 1;
      if (childDepth > maxDepth) {
        throw new CommitAbort({
          code: "WEFT_INVALID_PROPS",
          detail: `tree depth exceeds maxDepth=${String(maxDepth)} at <${vnodeTypeName(child.vnode)}>`,
        });
      }
      if (!warnedDepth && childDepth > WARN_DEPTH) {
        warnedDepth = true;
        warn(
          formatWarning(
            "commit",
            `tree depth passed ${String(WARN_DEPTH)} at <${vnodeTypeName(child.vnode)}>`,
          ),
        );
      }
      if (child.kind === "new") {
        mountNode(parentId, child.instanceId, child.vnode, childDepth);
      } else {
        updateNode(parentId, child.instanceId, child.vnode, childDepth);
      }
      ids.push(child.instanceId);
    }
    return ids;
  }

  function setNode(
    instanceId: InstanceId,
    parentId: InstanceId,
    vnode: VNode,
    children: readonly InstanceId[],
  ): void {
    nodes.set(
      instanceId,
      Object.freeze({ instanceId, parentId, vnode, children: Object.freeze(children) }),
    );
  }

  function mountNode(parentId: InstanceId, instanceId: InstanceId, vnode: VNode, depth: number): void {
    switch (vnode.kind) {
      case "host":
      case "fragment":
        setNode(instanceId, parentId, vnode, visitList(instanceId, [], vnode.children, depth, false));
        return;
      case "text":
      case "empty":
        setNode(instanceId, parentId, vnode, []);
        return;
      case "component": {
        arena.create(instanceId, vnode.name);
        mounted.push(instanceId);
        const output = renderComponent(instanceId, vnode);
        const pushed = pushFrames(instanceId);
        const children = visitList(instanceId, [], [output], depth, false);
        frames.pop(pushed);
        setNode(instanceId, parentId, vnode, children);
        return;
      }
    }
  }

  function updateNode(parentId: InstanceId, instanceId: InstanceId, vnode: VNode, depth: number): void {
    const prev = prevNode(instanceId);
    const onPath = dirtyPath.has(instanceId);
    if (vnode === prev.vnode && !onPath && vnode.kind !== "component") {
      skipped++;
      return;
    }

    switch (vnode.kind) {
      case "host": {
        if (prev.vnode.kind === "host" && prev.vnode !== vnode) {
          const diff = diffProps(prev.vnode.props, vnode.props);
          if (diff !== null) patch.push({ kind: "updateProps", instanceId, diff });
        }
        setNode(
          instanceId,
          parentId,
          vnode,
          visitList(instanceId, prev.children, vnode.children, depth, true),
        );
        return;
      }
      case "fragment":
        setNode(
          instanceId,
          parentId,
          vnode,
          visitList(instanceId, prev.children, vnode.children, depth, true),
        );
        return;
      case "text":
        if (prev.vnode.kind === "text" && prev.vnode.text !== vnode.text) {
          patch.push({ kind: "setText", instanceId, text: vnode.text });
        }
        setNode(instanceId, parentId, vnode, []);
        return;
      case "empty":
        setNode(instanceId, parentId, vnode, []);
        return;
      case "component":
        updateComponent(parentId, instanceId, prev, vnode, depth, onPath);
        return;
    }
  }

  function updateComponent(
    parentId: InstanceId,
    instanceId: InstanceId,
    prev: CommittedNode,
    vnode: ComponentVNode,
    depth: number,
    onPath: boolean,
  ): void {
    const prevVNode = prev.vnode;
    const samePropsAsBefore =
      vnode === prevVNode ||
      (prevVNode.kind === "component" && vnode.canSkip !== undefined && vnode.canSkip(prevVNode));

    if (samePropsAsBefore && !arena.isDirty(instanceId)) {
      skipped++;
      if (!onPath) {
        if (vnode !== prevVNode) setNode(instanceId, parentId, vnode, prev.children);
        return;
      }
      // A descendant is dirty: walk the previous output without re-rendering.
      const pushed = pushFrames(instanceId);
      const prevOutput = prev.children.map((id) => prevNode(id).vnode);
      const children = visitList(instanceId, prev.children, prevOutput, depth, true);
      frames.pop(pushed);
      setNode(instanceId, parentId, vnode, children);
      return;
    }

    const output = renderComponent(instanceId, vnode);
    updated.push(instanceId);
    const pushed = pushFrames(instanceId);
    const children = visitList(instanceId, prev.children, [output], depth, true);
    frames.pop(pushed);
    setNode(instanceId, parentId, vnode, children);
  }

  try {
    const rootIds = visitList(ROOT_PARENT_ID, prev ? [prev.rootId] : [], [root], 0, true);
    const rootId = rootIds[0];
    if (rootId === undefined) throw new Error("commitRender: root produced no instance");

    return {
      ok: true,
      value: Object.freeze({
        tree: Object.freeze({ rootId, nodes }),
        patch: Object.freeze(patch),
        lifecycle: Object.freeze({
          mounted: Object.freeze(mounted),
          updated: Object.freeze(updated),
          unmounted: Object.freeze(unmounted),
        }),
        effects: Object.freeze(effects),
        stats: Object.freeze({ visited, rendered, skipped }),
      }),
    };
  } catch (e: unknown) {
    if (e instanceof CommitAbort) return { ok: false, fatal: e.fatal };
    return { ok: false, fatal: { code: "WEFT_INVALID_STATE", detail: describeThrown(e) } };
  }
}
