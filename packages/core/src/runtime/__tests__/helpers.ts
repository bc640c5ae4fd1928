import { assert } from "@weft-tui/testkit";
import {
  type TreeMirror,
  applyPatch,
  createTreeMirror,
  describeMirror,
  describeTree,
} from "../../testing/mirror.js";
import type { VNode } from "../../vnode.js";
import { type CommitOk, type CommitResult, commitRender } from "../commit.js";
import { type EffectRunStats, runCommitEffects, unmountTree } from "../effects.js";
import { createContextFrameStack } from "../context.js";
import { type InstanceId, createInstanceIdAllocator } from "../instance.js";
import {
  type ArenaMessage,
  type HookArena,
  type HookContext,
  type PendingEffectSlot,
  createHookArena,
} from "../instances.js";
import type { RuntimeServices } from "../renderContext.js";
import type { CommitTree } from "../tree.js";

export type CommitHarness = Readonly<{
  arena: HookArena;
  /** Messages posted by setters and async effects, not yet delivered. */
  outbox: ArenaMessage[];
  warnings: string[];
  cleanupErrors: unknown[];
  mirror: TreeMirror;
  tree: () => CommitTree | null;
  /** Commit, replay the patch onto the mirror, run effects. Fails the test on a fatal. */
  render: (root: VNode) => CommitOk;
  /** Commit without advancing on failure; effects run only on success. */
  tryRender: (root: VNode) => CommitResult;
  lastEffects: () => EffectRunStats | null;
  /** Hand queued hook updates and settled async effects to the arena. */
  deliver: () => Readonly<{ updates: number; dropped: number; settled: number; stale: number }>;
  unmountAll: () => number;
}>;

export type CommitHarnessOptions = Readonly<{
  services?: RuntimeServices;
  maxDepth?: number;
}>;

export function createCommitHarness(opts: CommitHarnessOptions = {}): CommitHarness {
  const outbox: ArenaMessage[] = [];
  const warnings: string[] = [];
  const cleanupErrors: unknown[] = [];
  const arena = createHookArena((msg) => {
    outbox.push(msg);
  });
  const allocator = createInstanceIdAllocator();
  const mirror = createTreeMirror();
  let tree: CommitTree | null = null;
  let lastEffects: EffectRunStats | null = null;

  function tryRender(root: VNode): CommitResult {
    const res = commitRender(tree, root, {
      allocator,
      arena,
      services: opts.services,
      maxDepth: opts.maxDepth,
      warn: (m) => warnings.push(m),
    });
    if (!res.ok) return res;
    applyPatch(mirror, res.value.patch, res.value.tree);
    tree = res.value.tree;
    const fx = runCommitEffects(res.value, arena, (error) => cleanupErrors.push(error));
    if (!fx.ok) throw new Error(`effects failed: ${fx.fatal.detail}`);
    lastEffects = fx.value;
    return res;
  }

  return Object.freeze({
    arena,
    outbox,
    warnings,
    cleanupErrors,
    mirror,
    tree: () => tree,
    render(root: VNode): CommitOk {
      const res = tryRender(root);
      if (!res.ok) {
        assert.fail(`commit failed: ${res.fatal.code}: ${res.fatal.detail}`);
      }
      assert.deepEqual(describeMirror(mirror), describeTree(tree));
      return res.value;
    },
    tryRender,
    lastEffects: () => lastEffects,
    deliver() {
      let updates = 0;
      let dropped = 0;
      let settled = 0;
      let stale = 0;
      while (outbox.length > 0) {
        const msg = outbox.shift();
        if (msg === undefined) break;
        if (msg.kind === "hookUpdate") {
          if (arena.enqueueUpdate(msg)) updates++;
          else dropped++;
          continue;
        }
        if (arena.acceptSettlement(msg)) {
          msg.deliver();
          settled++;
        } else {
          stale++;
        }
      }
      return { updates, dropped, settled, stale };
    },
    unmountAll(): number {
      const count = unmountTree(tree, arena, (error) => cleanupErrors.push(error));
      tree = null;
      return count;
    },
  });
}

export type HookHarness = Readonly<{
  arena: HookArena;
  instanceId: InstanceId;
  outbox: ArenaMessage[];
  cleanupErrors: unknown[];
  /** One render of the instance: beginRender, `fn`, endRender. */
  render: <T>(fn: (hooks: HookContext) => T) => T;
  /** Effects scheduled by the last render. */
  pending: () => readonly PendingEffectSlot[];
  /** Run the last render's effects the way the loop does after a commit. */
  runEffects: () => EffectRunStats;
  /** Deliver queued hook updates; returns how many were accepted. */
  deliverUpdates: () => number;
  unmount: () => boolean;
}>;

/** Arena-level harness for a single component instance. */
export function createHookHarness(componentName = "Harness", instanceId: InstanceId = 1): HookHarness {
  const outbox: ArenaMessage[] = [];
  const cleanupErrors: unknown[] = [];
  const arena = createHookArena((msg) => {
    outbox.push(msg);
  });
  arena.create(instanceId, componentName);
  const frames = createContextFrameStack();
  let lastPending: readonly PendingEffectSlot[] = [];

  return Object.freeze({
    arena,
    instanceId,
    outbox,
    cleanupErrors,
    render<T>(fn: (hooks: HookContext) => T): T {
      const hooks = arena.beginRender(instanceId, frames);
      const result = fn(hooks);
      lastPending = arena.endRender(instanceId);
      return result;
    },
    pending: () => lastPending,
    runEffects(): EffectRunStats {
      const res = runCommitEffects(
        {
          lifecycle: { mounted: [], updated: [], unmounted: [] },
          effects: lastPending.length > 0 ? [{ instanceId, slots: lastPending }] : [],
        },
        arena,
        (error) => cleanupErrors.push(error),
      );
      if (!res.ok) throw new Error(res.fatal.detail);
      lastPending = [];
      return res.value;
    },
    deliverUpdates(): number {
      let accepted = 0;
      const kept: ArenaMessage[] = [];
      for (const msg of outbox.splice(0)) {
        if (msg.kind !== "hookUpdate") {
          kept.push(msg);
          continue;
        }
        if (arena.enqueueUpdate(msg)) accepted++;
      }
      outbox.push(...kept);
      return accepted;
    },
    unmount: () => arena.delete(instanceId, (error) => cleanupErrors.push(error)),
  });
}
