/**
 * packages/core/src/runtime/instances.ts — Hook arena.
 *
 * Why: Stores the per-instance hook slots that back useState, useReducer,
 * useRef, effects, memoization and context. Slots are addressed by the ordinal
 * position of the hook call, so every render of an instance must call the same
 * hooks in the same order; any deviation is a HookOrderError.
 *
 * State changes never mutate a slot directly. Setters post a message through
 * the arena's `post` sink (the app's inbox); the loop hands it back with
 * `enqueueUpdate`, and the next render folds the queued updates in posting
 * order.
 *
 * Instance lifecycle:
 *   - Created when the reconciler mounts a component
 *   - Reused across renders while type and key match
 *   - Deleted on unmount: generation bumped, async work aborted, cleanups run
 */

import { HookOrderError } from "../errors.js";
import type { Context, ContextFrame, ContextFrameStack } from "./context.js";
import type { InstanceId } from "./instance.js";

/** Dependency list; `undefined` means "every commit". */
export type Deps = readonly unknown[] | undefined;

/** Effect cleanup function returned by effect callbacks. */
export type EffectCleanup = () => void;

/** Outcome of an async effect task. */
export type AsyncResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: unknown }>;

export type StateSetter<T> = (next: T | ((prev: T) => T)) => void;
export type Dispatch<A> = (action: A) => void;

type UnknownCallback = (...args: never[]) => unknown;

/** A state or reducer update travelling through the inbox. */
export type HookUpdateMessage = Readonly<{
  kind: "hookUpdate";
  instanceId: InstanceId;
  generation: number;
  slotIndex: number;
  update: unknown;
}>;

/** Completion of an async effect run travelling through the inbox. */
export type AsyncSettledMessage = Readonly<{
  kind: "asyncSettled";
  instanceId: InstanceId;
  instanceGeneration: number;
  slotIndex: number;
  runGeneration: number;
  /** Invokes the run's onSettled callback with its result. */
  deliver: () => void;
}>;

export type ArenaMessage = HookUpdateMessage | AsyncSettledMessage;

// =============================================================================
// Slots
// =============================================================================

export type UpdateQueueSlot = {
  kind: "state" | "reducer";
  value: unknown;
  /** Updates accepted by the loop, folded at the next render. */
  queue: unknown[];
  /** Updates posted but not yet accepted. */
  inFlight: number;
  dispatch: (action: unknown) => void;
};

export type RefSlot = {
  kind: "ref";
  ref: { current: unknown };
};

export type EffectSlot = {
  kind: "effect";
  index: number;
  deps: Deps;
  body: () => EffectCleanup | undefined;
  cleanup: EffectCleanup | undefined;
  /** True while a body is waiting for the post-commit flush. */
  pending: boolean;
};

export type AsyncEffectSlot = {
  kind: "asyncEffect";
  index: number;
  deps: Deps;
  /** Starts the task; resolves to a thunk delivering the result. */
  run: (signal: AbortSignal) => Promise<() => void>;
  controller: AbortController | undefined;
  /** Bumped on every run and on abort; settlements carry it back. */
  generation: number;
  pending: boolean;
};

export type MemoSlot = {
  kind: "memo";
  deps: Deps;
  value: unknown;
};

export type CallbackSlot = {
  kind: "callback";
  deps: Deps;
  callback: UnknownCallback;
};

export type ContextReadSlot = {
  kind: "context";
  contextId: symbol;
  /** Frame this instance is subscribed to; left on unmount or provider change. */
  frame: ContextFrame | undefined;
};

/** A provided value; doubles as the frame pushed for the subtree. */
export type ProviderFrame = {
  contextId: symbol;
  providerId: InstanceId;
  value: unknown;
  subscribers: Set<InstanceId>;
};

export type ProviderSlot = {
  kind: "provider";
  frame: ProviderFrame;
};

export type HookSlot =
  | UpdateQueueSlot
  | RefSlot
  | EffectSlot
  | AsyncEffectSlot
  | MemoSlot
  | CallbackSlot
  | ContextReadSlot
  | ProviderSlot;

export type HookKind = HookSlot["kind"];

export type PendingEffectSlot = EffectSlot | AsyncEffectSlot;

const HOOK_NAMES: Readonly<Record<HookKind, string>> = Object.freeze({
  state: "useState",
  reducer: "useReducer",
  ref: "useRef",
  effect: "useEffect",
  asyncEffect: "useAsyncEffect",
  memo: "useMemo",
  callback: "useCallback",
  context: "useContext",
  provider: "useContextProvider",
});

// =============================================================================
// Instance state
// =============================================================================

/** Read-only view of one instance's arena. */
export type InstanceState = Readonly<{
  instanceId: InstanceId;
  componentName: string;
  hooks: readonly HookSlot[];
  /** Hook count recorded by the first successful render. */
  expectedHookCount: number | null;
  needsRender: boolean;
  /** Bumped on unmount; stale setters and settlements compare against it. */
  generation: number;
}>;

type MutableInstanceState = {
  instanceId: InstanceId;
  componentName: string;
  hooks: HookSlot[];
  hookIndex: number;
  expectedHookCount: number | null;
  needsRender: boolean;
  generation: number;
  pendingEffects: PendingEffectSlot[];
  changedProviders: ProviderFrame[];
};

/** Hook primitives available to a rendering component. */
export type HookContext = Readonly<{
  useState: <T>(initial: T | (() => T)) => [T, StateSetter<T>];
  useReducer: <S, A>(reducer: (state: S, action: A) => S, initial: S | (() => S)) => [S, Dispatch<A>];
  useRef: <T>(initial: T) => { current: T };
  useEffect: (effect: () => void | EffectCleanup, deps?: Deps) => void;
  useAsyncEffect: <T>(
    task: (signal: AbortSignal) => Promise<T>,
    deps: Deps,
    onSettled: (result: AsyncResult<T>) => void,
  ) => void;
  useMemo: <T>(factory: () => T, deps: Deps) => T;
  useCallback: <F extends UnknownCallback>(callback: F, deps: Deps) => F;
  useContext: <T>(context: Context<T>) => T;
  useContextProvider: <T>(context: Context<T>, value: T) => void;
}>;

/** Instance registry and hook storage. */
export type HookArena = Readonly<{
  get: (instanceId: InstanceId) => InstanceState | undefined;
  has: (instanceId: InstanceId) => boolean;

  /** Create arena storage for a freshly mounted instance. Throws if it exists. */
  create: (instanceId: InstanceId, componentName: string) => InstanceState;

  /**
   * Unmount: bump generation, abort async effects, run effect cleanups in
   * reverse declaration order. Returns true if the instance existed.
   */
  delete: (instanceId: InstanceId, onCleanupError: (error: unknown) => void) => boolean;

  /** Mark instance as needing re-render. */
  invalidate: (instanceId: InstanceId) => void;
  isDirty: (instanceId: InstanceId) => boolean;
  dirtyIds: () => readonly InstanceId[];

  /** Reset hook index for a new render and return the hook primitives. */
  beginRender: (instanceId: InstanceId, frames: ContextFrameStack) => HookContext;

  /** Validate hook count after render and collect pending effect slots. */
  endRender: (instanceId: InstanceId) => readonly PendingEffectSlot[];

  /** Provider frames whose value changed during the most recent render. */
  takeChangedProviders: (instanceId: InstanceId) => readonly ProviderFrame[];

  /** Frames the instance provides to its subtree, in slot order. */
  providerFrames: (instanceId: InstanceId) => readonly ProviderFrame[];

  /** Accept a posted update. Returns false for a stale or unknown target. */
  enqueueUpdate: (msg: HookUpdateMessage) => boolean;

  /** Check a settlement against the live slot. False means stale: discard it. */
  acceptSettlement: (msg: AsyncSettledMessage) => boolean;

  /** Sink for messages produced by setters and async effects. */
  post: (msg: ArenaMessage) => void;

  getAllIds: () => readonly InstanceId[];
}>;

/**
 * Compare dependency arrays for equality.
 * Returns true only if both are arrays with equal elements.
 * If either is undefined (no deps), returns false to trigger re-run.
 */
export function depsEqual(prev: Deps, next: Deps): boolean {
  if (prev === undefined || next === undefined) return false;
  if (prev.length !== next.length) return false;

  for (let i = 0; i < prev.length; i++) {
    if (!Object.is(prev[i], next[i])) return false;
  }
  return true;
}

function basicStateReducer<T>(prev: T, action: T | ((prev: T) => T)): T {
  return typeof action === "function" ? (action as (prev: T) => T)(prev) : action;
}

function mismatch(state: MutableInstanceState, index: number, called: HookKind, recorded: HookKind) {
  return new HookOrderError(
    state.instanceId,
    state.componentName,
    index,
    `called ${HOOK_NAMES[called]} where the previous render called ${HOOK_NAMES[recorded]}`,
  );
}

function assertCanCreateHook(state: MutableInstanceState, index: number, kind: HookKind): void {
  if (state.expectedHookCount !== null && index >= state.expectedHookCount) {
    throw new HookOrderError(
      state.instanceId,
      state.componentName,
      index,
      `called ${HOOK_NAMES[kind]} after the ${String(state.expectedHookCount)} hooks of the previous render`,
    );
  }
}

/** Create an empty arena whose setters post through `post`. */
export function createHookArena(post: (msg: ArenaMessage) => void): HookArena {
  const instances = new Map<InstanceId, MutableInstanceState>();

  function createHookContext(state: MutableInstanceState, frames: ContextFrameStack): HookContext {
    function nextIndex(): number {
      const index = state.hookIndex;
      state.hookIndex++;
      return index;
    }

    function useQueued<S, A>(
      kind: "state" | "reducer",
      reducer: (prev: S, action: A) => S,
      initial: S | (() => S),
    ): [S, Dispatch<A>] {
      const index = nextIndex();
      const existing = state.hooks[index];

      let slot: UpdateQueueSlot;
      if (existing === undefined) {
        assertCanCreateHook(state, index, kind);
        const generation = state.generation;
        const instanceId = state.instanceId;
        const created: UpdateQueueSlot = {
          kind,
          value: typeof initial === "function" ? (initial as () => S)() : initial,
          queue: [],
          inFlight: 0,
          dispatch: (action: unknown) => {
            // Stale closure: the instance was unmounted.
            if (state.generation !== generation) return;
            if (
              kind === "state" &&
              typeof action !== "function" &&
              created.inFlight === 0 &&
              created.queue.length === 0 &&
              Object.is(created.value, action)
            ) {
              return;
            }
            created.inFlight++;
            post({ kind: "hookUpdate", instanceId, generation, slotIndex: index, update: action });
          },
        };
        state.hooks[index] = created;
        slot = created;
      } else if (
        (existing.kind === "state" || existing.kind === "reducer") &&
        existing.kind === kind
      ) {
        slot = existing;
      } else {
        throw mismatch(state, index, kind, existing.kind);
      }

      if (slot.queue.length > 0) {
        let value = slot.value as S;
        const queue = slot.queue;
        slot.queue = [];
        for (const action of queue) {
          value = reducer(value, action as A);
        }
        slot.value = value;
      }

      return [slot.value as S, slot.dispatch];
    }

    return Object.freeze({
      useState<T>(initial: T | (() => T)): [T, StateSetter<T>] {
        return useQueued<T, T | ((prev: T) => T)>("state", basicStateReducer, initial);
      },

      useReducer<S, A>(reducer: (state: S, action: A) => S, initial: S | (() => S)): [S, Dispatch<A>] {
        return useQueued<S, A>("reducer", reducer, initial);
      },

      useRef<T>(initial: T): { current: T } {
        const index = nextIndex();
        const existing = state.hooks[index];

        if (existing === undefined) {
          assertCanCreateHook(state, index, "ref");
          const ref: { current: T } = { current: initial };
          state.hooks[index] = { kind: "ref", ref };
          return ref;
        }
        if (existing.kind !== "ref") throw mismatch(state, index, "ref", existing.kind);
        return existing.ref as { current: T };
      },

      useEffect(effect: () => void | EffectCleanup, deps?: Deps): void {
        const index = nextIndex();
        const existing = state.hooks[index];
        const body = (): EffectCleanup | undefined => {
          const result = effect();
          return typeof result === "function" ? result : undefined;
        };

        if (existing === undefined) {
          assertCanCreateHook(state, index, "effect");
          const slot: EffectSlot = { kind: "effect", index, deps, body, cleanup: undefined, pending: true };
          state.hooks[index] = slot;
          state.pendingEffects.push(slot);
          return;
        }
        if (existing.kind !== "effect") throw mismatch(state, index, "effect", existing.kind);

        if (!depsEqual(existing.deps, deps) || existing.pending) {
          existing.deps = deps;
          existing.body = body;
          existing.pending = true;
          state.pendingEffects.push(existing);
        }
      },

      useAsyncEffect<T>(
        task: (signal: AbortSignal) => Promise<T>,
        deps: Deps,
        onSettled: (result: AsyncResult<T>) => void,
      ): void {
        const index = nextIndex();
        const existing = state.hooks[index];
        const run = (signal: AbortSignal): Promise<() => void> =>
          Promise.resolve()
            .then(() => task(signal))
            .then(
              (value) => () => onSettled({ ok: true, value }),
              (error: unknown) => () => onSettled({ ok: false, error }),
            );

        if (existing === undefined) {
          assertCanCreateHook(state, index, "asyncEffect");
          const slot: AsyncEffectSlot = {
            kind: "asyncEffect",
            index,
            deps,
            run,
            controller: undefined,
            generation: 0,
            pending: true,
          };
          state.hooks[index] = slot;
          state.pendingEffects.push(slot);
          return;
        }
        if (existing.kind !== "asyncEffect") {
          throw mismatch(state, index, "asyncEffect", existing.kind);
        }

        if (!depsEqual(existing.deps, deps) || existing.pending) {
          existing.deps = deps;
          existing.run = run;
          existing.pending = true;
          state.pendingEffects.push(existing);
        }
      },

      useMemo<T>(factory: () => T, deps: Deps): T {
        const index = nextIndex();
        const existing = state.hooks[index];

        if (existing === undefined) {
          assertCanCreateHook(state, index, "memo");
          const value = factory();
          state.hooks[index] = { kind: "memo", deps, value };
          return value;
        }
        if (existing.kind !== "memo") throw mismatch(state, index, "memo", existing.kind);

        if (!depsEqual(existing.deps, deps)) {
          const value = factory();
          existing.deps = deps;
          existing.value = value;
          return value;
        }
        return existing.value as T;
      },

      useCallback<F extends UnknownCallback>(callback: F, deps: Deps): F {
        const index = nextIndex();
        const existing = state.hooks[index];

        if (existing === undefined) {
          assertCanCreateHook(state, index, "callback");
          state.hooks[index] = { kind: "callback", deps, callback };
          return callback;
        }
        if (existing.kind !== "callback") throw mismatch(state, index, "callback", existing.kind);

        if (!depsEqual(existing.deps, deps)) {
          existing.deps = deps;
          existing.callback = callback;
          return callback;
        }
        return existing.callback as F;
      },

      useContext<T>(context: Context<T>): T {
        const index = nextIndex();
        const existing = state.hooks[index];
        let slot: ContextReadSlot;

        if (existing === undefined) {
          assertCanCreateHook(state, index, "context");
          slot = { kind: "context", contextId: context.id, frame: undefined };
          state.hooks[index] = slot;
        } else if (existing.kind !== "context") {
          throw mismatch(state, index, "context", existing.kind);
        } else if (existing.contextId !== context.id) {
          throw new HookOrderError(
            state.instanceId,
            state.componentName,
            index,
            `useContext(${context.name}) read a different context than the previous render`,
          );
        } else {
          slot = existing;
        }

        const frame = frames.lookup(context.id);
        if (slot.frame !== frame) {
          slot.frame?.subscribers.delete(state.instanceId);
          slot.frame = frame;
        }
        if (frame === undefined) return context.defaultValue;
        frame.subscribers.add(state.instanceId);
        return frame.value as T;
      },

      useContextProvider<T>(context: Context<T>, value: T): void {
        const index = nextIndex();
        const existing = state.hooks[index];

        if (existing === undefined) {
          assertCanCreateHook(state, index, "provider");
          state.hooks[index] = {
            kind: "provider",
            frame: {
              contextId: context.id,
              providerId: state.instanceId,
              value,
              subscribers: new Set<InstanceId>(),
            },
          };
          return;
        }
        if (existing.kind !== "provider") throw mismatch(state, index, "provider", existing.kind);
        if (existing.frame.contextId !== context.id) {
          throw new HookOrderError(
            state.instanceId,
            state.componentName,
            index,
            `useContextProvider(${context.name}) provided a different context than the previous render`,
          );
        }

        if (!Object.is(existing.frame.value, value)) {
          existing.frame.value = value;
          state.changedProviders.push(existing.frame);
        }
      },
    });
  }

  function runUnmountCleanups(
    state: MutableInstanceState,
    onCleanupError: (error: unknown) => void,
  ): void {
    // Reverse declaration order.
    for (let i = state.hooks.length - 1; i >= 0; i--) {
      const slot = state.hooks[i];
      if (slot === undefined) continue;
      switch (slot.kind) {
        case "effect": {
          const cleanup = slot.cleanup;
          slot.cleanup = undefined;
          slot.pending = false;
          if (cleanup === undefined) break;
          try {
            cleanup();
          } catch (error: unknown) {
            onCleanupError(error);
          }
          break;
        }
        case "asyncEffect":
          slot.generation++;
          slot.pending = false;
          slot.controller?.abort();
          slot.controller = undefined;
          break;
        case "context":
          slot.frame?.subscribers.delete(state.instanceId);
          slot.frame = undefined;
          break;
        case "provider":
          slot.frame.subscribers.clear();
          break;
        default:
          break;
      }
    }
  }

  return Object.freeze({
    get(instanceId: InstanceId): InstanceState | undefined {
      return instances.get(instanceId);
    },

    has(instanceId: InstanceId): boolean {
      return instances.has(instanceId);
    },

    create(instanceId: InstanceId, componentName: string): InstanceState {
      if (instances.has(instanceId)) {
        throw new Error(`HookArena: instance ${String(instanceId)} already exists`);
      }
      const state: MutableInstanceState = {
        instanceId,
        componentName,
        hooks: [],
        hookIndex: 0,
        expectedHookCount: null,
        needsRender: true,
        generation: 0,
        pendingEffects: [],
        changedProviders: [],
      };
      instances.set(instanceId, state);
      return state;
    },

    delete(instanceId: InstanceId, onCleanupError: (error: unknown) => void): boolean {
      const state = instances.get(instanceId);
      if (!state) return false;

      // Bump generation before cleanup so setters called from cleanups are no-ops.
      state.generation++;
      instances.delete(instanceId);
      runUnmountCleanups(state, onCleanupError);
      return true;
    },

    invalidate(instanceId: InstanceId): void {
      const state = instances.get(instanceId);
      if (state) state.needsRender = true;
    },

    isDirty(instanceId: InstanceId): boolean {
      return instances.get(instanceId)?.needsRender ?? false;
    },

    dirtyIds(): readonly InstanceId[] {
      const ids: InstanceId[] = [];
      for (const state of instances.values()) {
        if (state.needsRender) ids.push(state.instanceId);
      }
      return ids;
    },

    beginRender(instanceId: InstanceId, frames: ContextFrameStack): HookContext {
      const state = instances.get(instanceId);
      if (!state) {
        throw new Error(`HookArena: beginRender on unknown instance ${String(instanceId)}`);
      }
      state.hookIndex = 0;
      state.pendingEffects = [];
      state.changedProviders = [];
      return createHookContext(state, frames);
    },

    endRender(instanceId: InstanceId): readonly PendingEffectSlot[] {
      const state = instances.get(instanceId);
      if (!state) return [];

      const used = state.hookIndex;
      if (state.expectedHookCount === null) {
        state.expectedHookCount = used;
      } else if (used !== state.expectedHookCount) {
        throw new HookOrderError(
          instanceId,
          state.componentName,
          used,
          `rendered ${String(used)} hooks, the previous render called ${String(
            state.expectedHookCount,
          )}`,
        );
      }

      state.needsRender = false;
      return Object.freeze(state.pendingEffects);
    },

    takeChangedProviders(instanceId: InstanceId): readonly ProviderFrame[] {
      const state = instances.get(instanceId);
      if (!state || state.changedProviders.length === 0) return [];
      const changed = state.changedProviders;
      state.changedProviders = [];
      return changed;
    },

    providerFrames(instanceId: InstanceId): readonly ProviderFrame[] {
      const state = instances.get(instanceId);
      if (!state) return [];
      const frames: ProviderFrame[] = [];
      for (const slot of state.hooks) {
        if (slot.kind === "provider") frames.push(slot.frame);
      }
      return frames;
    },

    enqueueUpdate(msg: HookUpdateMessage): boolean {
      const state = instances.get(msg.instanceId);
      if (!state || state.generation !== msg.generation) return false;
      const slot = state.hooks[msg.slotIndex];
      if (slot === undefined || (slot.kind !== "state" && slot.kind !== "reducer")) return false;

      slot.inFlight = Math.max(0, slot.inFlight - 1);
      slot.queue.push(msg.update);
      state.needsRender = true;
      return true;
    },

    acceptSettlement(msg: AsyncSettledMessage): boolean {
      const state = instances.get(msg.instanceId);
      if (!state || state.generation !== msg.instanceGeneration) return false;
      const slot = state.hooks[msg.slotIndex];
      if (slot === undefined || slot.kind !== "asyncEffect") return false;
      return slot.generation === msg.runGeneration;
    },

    post,

    getAllIds(): readonly InstanceId[] {
      return Object.freeze(Array.from(instances.keys()));
    },
  });
}
