/**
 * packages/core/src/runtime/effects.ts — Effect scheduler.
 *
 * Why: Runs the effects a render pass scheduled, strictly after the backend
 * accepted the frame. Order for one commit:
 *   1. unmount cleanups (unmounted instances in previous-tree pre-order;
 *      each instance's effects in reverse declaration order)
 *   2. cleanups of effects whose deps changed, in render order
 *   3. new effect bodies, in render order; async tasks are started
 *
 * Async tasks report back through the arena's post sink with the run's
 * generation; the loop discards settlements whose generation is stale.
 * State updates made by effect bodies go through the inbox and therefore
 * land in the next render pass.
 */

import { type WeftFatal, describeThrown } from "../errors.js";
import type { CommitOk } from "./commit.js";
import type { InstanceId } from "./instance.js";
import type { AsyncEffectSlot, EffectSlot, HookArena } from "./instances.js";
import { type CommitTree, collectSubtree } from "./tree.js";

export type CleanupErrorHandler = (error: unknown, instanceId: InstanceId) => void;

export type EffectRunStats = Readonly<{
  unmounted: number;
  cleanups: number;
  bodies: number;
  asyncStarted: number;
}>;

export type EffectRunResult =
  | Readonly<{ ok: true; value: EffectRunStats }>
  | Readonly<{ ok: false; fatal: WeftFatal<"WEFT_USER_CODE_THROW"> }>;

function runDepChangeCleanup(
  slot: EffectSlot | AsyncEffectSlot,
  instanceId: InstanceId,
  onCleanupError: CleanupErrorHandler,
): boolean {
  if (slot.kind === "asyncEffect") {
    if (slot.controller === undefined) return false;
    slot.controller.abort();
    slot.controller = undefined;
    return true;
  }
  const cleanup = slot.cleanup;
  if (cleanup === undefined) return false;
  slot.cleanup = undefined;
  try {
    cleanup();
  } catch (error: unknown) {
    onCleanupError(error, instanceId);
  }
  return true;
}

function startAsync(
  arena: HookArena,
  instanceId: InstanceId,
  instanceGeneration: number,
  slot: AsyncEffectSlot,
): void {
  slot.generation++;
  slot.pending = false;
  const runGeneration = slot.generation;
  const slotIndex = slot.index;
  const controller = new AbortController();
  slot.controller = controller;

  void slot.run(controller.signal).then(
    (deliver) => {
      arena.post({
        kind: "asyncSettled",
        instanceId,
        instanceGeneration,
        slotIndex,
        runGeneration,
        deliver,
      });
    },
    (error: unknown) => {
      arena.post({
        kind: "asyncSettled",
        instanceId,
        instanceGeneration,
        slotIndex,
        runGeneration,
        deliver: () => {
          throw error;
        },
      });
    },
  );
}

/** Run unmount cleanups, dep-change cleanups and effect bodies for one commit. */
export function runCommitEffects(
  commit: Pick<CommitOk, "lifecycle" | "effects">,
  arena: HookArena,
  onCleanupError: CleanupErrorHandler,
): EffectRunResult {
  let unmounted = 0;
  let cleanups = 0;
  let bodies = 0;
  let asyncStarted = 0;

  for (const instanceId of commit.lifecycle.unmounted) {
    if (arena.delete(instanceId, (error) => onCleanupError(error, instanceId))) unmounted++;
  }

  for (const batch of commit.effects) {
    if (!arena.has(batch.instanceId)) continue;
    for (const slot of batch.slots) {
      if (runDepChangeCleanup(slot, batch.instanceId, onCleanupError)) cleanups++;
    }
  }

  for (const batch of commit.effects) {
    const instance = arena.get(batch.instanceId);
    if (instance === undefined) continue;
    for (const slot of batch.slots) {
      if (!slot.pending) continue;
      if (slot.kind === "asyncEffect") {
        startAsync(arena, batch.instanceId, instance.generation, slot);
        asyncStarted++;
        continue;
      }
      slot.pending = false;
      try {
        slot.cleanup = slot.body();
      } catch (e: unknown) {
        return {
          ok: false,
          fatal: {
            code: "WEFT_USER_CODE_THROW",
            detail: `<${instance.componentName}> effect threw: ${describeThrown(e)}`,
          },
        };
      }
      bodies++;
    }
  }

  return { ok: true, value: Object.freeze({ unmounted, cleanups, bodies, asyncStarted }) };
}

/**
 * Unmount every component instance of `tree` (pre-order), running their
 * cleanups. Used when the app exits.
 */
export function unmountTree(
  tree: CommitTree | null,
  arena: HookArena,
  onCleanupError: CleanupErrorHandler,
): number {
  if (tree === null) return 0;
  const ids: InstanceId[] = [];
  collectSubtree(tree.nodes, tree.rootId, ids);
  let count = 0;
  for (const instanceId of ids) {
    if (arena.delete(instanceId, (error) => onCleanupError(error, instanceId))) count++;
  }
  return count;
}
