/**
 * packages/core/src/app/createApp.ts — App runtime (render/event loop).
 *
 * Why: Owns the inbox, the committed tree, the hook arena and the backend
 * lifecycle. One loop turn drains every available message (terminal events,
 * hook updates, async completions, exit requests, fatal reports), renders at
 * most once per quiescence point, hands the patch to the backend, then runs
 * the effects scheduled by that pass. Updates queued by effects send the loop
 * straight back to rendering, bounded by `maxConsecutiveRenders`.
 *
 * Every exit path (exit request, stop, input closed, fatal) unmounts the
 * tree and calls backend.stop() then backend.dispose() exactly once.
 */

import type { TerminalBackend } from "../backend.js";
import { type WarnFn, formatWarning, warnDev } from "../debug/warn.js";
import { WeftError, type WeftErrorCode, type WeftFatal, describeThrown } from "../errors.js";
import type {
  EventHandler,
  TerminalEvent,
  TerminalEventHandler,
  UiEvent,
  Viewport,
} from "../events.js";
import { monotonicNow, perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import { DEFAULT_MAX_DEPTH, commitRender } from "../runtime/commit.js";
import { type CleanupErrorHandler, runCommitEffects, unmountTree } from "../runtime/effects.js";
import { createInstanceIdAllocator } from "../runtime/instance.js";
import { type ArenaMessage, createHookArena } from "../runtime/instances.js";
import type { RuntimeServices } from "../runtime/renderContext.js";
import type { CommitTree } from "../runtime/tree.js";
import type { VNode } from "../vnode.js";
import { createInbox } from "./inbox.js";
import { AppStateMachine, type AppState, type LoopPhase, canEnterPhase } from "./stateMachine.js";
import type {
  App,
  AppConfig,
  AppMetrics,
  CreateAppOptions,
  ResolvedAppConfig,
} from "./types.js";

/** Default config values. */
const DEFAULT_CONFIG: ResolvedAppConfig = Object.freeze({
  maxConsecutiveRenders: 100,
  maxDepth: DEFAULT_MAX_DEPTH,
  devWarnings: true,
  onWarning: undefined,
  onCommit: undefined,
});

function invalidProps(detail: string): never {
  throw new WeftError("WEFT_INVALID_PROPS", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function optionalCallback<F>(name: string, v: F | undefined): F | undefined {
  if (v === undefined) return undefined;
  if (typeof v !== "function") invalidProps(`${name} must be a function`);
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveAppConfig(config: AppConfig | undefined): ResolvedAppConfig {
  if (!config) return DEFAULT_CONFIG;
  const maxConsecutiveRenders =
    config.maxConsecutiveRenders === undefined
      ? DEFAULT_CONFIG.maxConsecutiveRenders
      : requirePositiveInt("maxConsecutiveRenders", config.maxConsecutiveRenders);
  const maxDepth =
    config.maxDepth === undefined
      ? DEFAULT_CONFIG.maxDepth
      : requirePositiveInt("maxDepth", config.maxDepth);
  if (config.devWarnings !== undefined && typeof config.devWarnings !== "boolean") {
    invalidProps("devWarnings must be a boolean");
  }
  const devWarnings = config.devWarnings !== false;

  return Object.freeze({
    maxConsecutiveRenders,
    maxDepth,
    devWarnings,
    onWarning: optionalCallback("onWarning", config.onWarning),
    onCommit: optionalCallback("onCommit", config.onCommit),
  });
}

/**
 * Internal work items carried by the inbox.
 *   - event: terminal input from backend polling
 *   - hookUpdate / asyncSettled: posted by the hook arena
 *   - exit: requestExit(), stop(), dispose() or closed input
 *   - fatal: failure observed outside the loop (backend polling)
 */
type InboxMessage =
  | Readonly<{ kind: "event"; event: TerminalEvent }>
  | ArenaMessage
  | Readonly<{ kind: "exit" }>
  | Readonly<{ kind: "fatal"; code: WeftErrorCode; detail: string }>;

type HandlerSlot<F> = { fn: F; active: { value: boolean } };

type ExitWaiter = Readonly<{ resolve: () => void; reject: (error: WeftError) => void }>;

function addSlot<F>(list: HandlerSlot<F>[], fn: F): () => void {
  const slot: HandlerSlot<F> = { fn, active: { value: true } };
  list.push(slot);
  return () => {
    slot.active.value = false;
    const idx = list.indexOf(slot);
    if (idx !== -1) list.splice(idx, 1);
  };
}

function activeSnapshot<F>(list: readonly HandlerSlot<F>[]): HandlerSlot<F>[] {
  return list.filter((slot) => slot.active.value);
}

/** Create an app that renders `root` through `backend`. */
export function createApp(opts: CreateAppOptions): App {
  const backend: TerminalBackend = opts.backend;
  const root: VNode = opts.root;
  const config = resolveAppConfig(opts.config);

  const sm = new AppStateMachine();
  const inbox = createInbox<InboxMessage>();
  const arena = createHookArena((msg) => {
    inbox.push(msg);
  });
  const allocator = createInstanceIdAllocator();

  const handlers: HandlerSlot<EventHandler>[] = [];
  const subscribers: HandlerSlot<TerminalEventHandler>[] = [];

  let phase: LoopPhase = "idle";
  let tree: CommitTree | null = null;
  let mounted = false;
  let viewport: Viewport = Object.freeze({ cols: 80, rows: 24 });

  let starting = false;
  let busy = true;
  let inUserCode = 0;
  let disposeAfterExit = false;

  let passes = 0;
  let eventCount = 0;
  let staleCompletions = 0;
  let droppedUpdates = 0;

  let idleWaiters: Array<() => void> = [];
  let exitWaiters: ExitWaiter[] = [];
  let finishWaiters: Array<() => void> = [];
  let outcome: Readonly<{ error: WeftError | null }> | null = null;

  const warn: WarnFn = (message) => {
    if (!config.devWarnings) return;
    if (config.onWarning !== undefined) {
      config.onWarning(message);
      return;
    }
    warnDev(message);
  };

  const onCleanupError: CleanupErrorHandler = (error, instanceId) => {
    warn(
      formatWarning(
        "effects",
        `cleanup of instance ${String(instanceId)} threw: ${describeThrown(error)}`,
      ),
    );
  };

  const services: RuntimeServices = Object.freeze({
    subscribeEvents: (handler: TerminalEventHandler) => addSlot(subscribers, handler),
    getViewport: () => viewport,
    requestExit: () => {
      requestExit();
    },
  });

  function throwCode(code: WeftErrorCode, detail: string): never {
    throw new WeftError(code, detail);
  }

  function assertNotReentrant(method: string): void {
    if (inUserCode > 0) {
      throwCode("WEFT_REENTRANT_CALL", `${method}: re-entrant call`);
    }
  }

  function setPhase(next: LoopPhase): void {
    if (!canEnterPhase(phase, next)) {
      throwCode("WEFT_INVALID_STATE", `loop phase ${phase} cannot move to ${next}`);
    }
    phase = next;
  }

  function flushIdleWaiters(): void {
    if (idleWaiters.length === 0) return;
    const pending = idleWaiters;
    idleWaiters = [];
    for (const resolve of pending) resolve();
  }

  function enterIdle(): void {
    setPhase("idle");
    busy = false;
    flushIdleWaiters();
  }

  function requestExit(): void {
    if (sm.state !== "Running") return;
    inbox.push({ kind: "exit" });
  }

  // ---------------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------------

  async function teardown(): Promise<void> {
    inbox.close();

    const committed = tree;
    tree = null;
    try {
      unmountTree(committed, arena, onCleanupError);
    } catch (e: unknown) {
      warn(formatWarning("loop", `unmount failed: ${describeThrown(e)}`));
    }

    await releaseBackend();

    phase = "idle";
    busy = false;
    flushIdleWaiters();
  }

  function settle(error: WeftError | null): void {
    outcome = Object.freeze({ error });
    if (disposeAfterExit) sm.dispose();

    const exits = exitWaiters;
    exitWaiters = [];
    for (const w of exits) {
      if (error === null) w.resolve();
      else w.reject(error);
    }
    const finished = finishWaiters;
    finishWaiters = [];
    for (const resolve of finished) resolve();
  }

  async function shutdown(): Promise<void> {
    if (sm.state !== "Running") return;
    sm.toStopped();
    await teardown();
    settle(null);
  }

  /** backend.stop() then backend.dispose(); failures are warnings. */
  async function releaseBackend(): Promise<void> {
    try {
      await backend.stop();
    } catch (e: unknown) {
      warn(formatWarning("loop", `backend.stop rejected: ${describeThrown(e)}`));
    }
    try {
      backend.dispose();
    } catch (e: unknown) {
      warn(formatWarning("loop", `backend.dispose threw: ${describeThrown(e)}`));
    }
  }

  async function doFatal(fatal: WeftFatal): Promise<void> {
    if (sm.state !== "Running") return;

    // 1) emit fatal to handlers (registration order, best-effort)
    const fatalEv: UiEvent = Object.freeze({ kind: "fatal", code: fatal.code, detail: fatal.detail });
    for (const slot of activeSnapshot(handlers)) {
      try {
        slot.fn(fatalEv);
      } catch (e: unknown) {
        warn(formatWarning("loop", `onEvent handler threw on fatal: ${describeThrown(e)}`));
      }
    }

    // 2) transition to Faulted, 3) tear the backend down
    sm.toFaulted();
    await teardown();
    settle(fatal.error ?? new WeftError(fatal.code, fatal.detail));
  }

  // ---------------------------------------------------------------------------
  // Message processing
  // ---------------------------------------------------------------------------

  function dispatchEvent(event: TerminalEvent): WeftFatal | null {
    if (event.kind === "resize") {
      viewport = Object.freeze({ cols: event.cols, rows: event.rows });
    }
    eventCount++;

    const token = perfMarkStart("event_dispatch");
    inUserCode++;
    try {
      const uiEvent: UiEvent = Object.freeze({ kind: "terminal", event });
      for (const slot of activeSnapshot(handlers)) {
        if (!slot.active.value) continue;
        try {
          slot.fn(uiEvent);
        } catch (e: unknown) {
          return {
            code: "WEFT_USER_CODE_THROW",
            detail: `onEvent handler threw: ${describeThrown(e)}`,
          };
        }
      }
      for (const slot of activeSnapshot(subscribers)) {
        if (!slot.active.value) continue;
        try {
          slot.fn(event);
        } catch (e: unknown) {
          return {
            code: "WEFT_USER_CODE_THROW",
            detail: `event subscriber threw: ${describeThrown(e)}`,
          };
        }
      }
      return null;
    } finally {
      inUserCode--;
      perfMarkEnd("event_dispatch", token);
    }
  }

  /** Returns "exit", a fatal, or null to keep going. */
  function processBatch(batch: readonly InboxMessage[]): "exit" | WeftFatal | null {
    for (const msg of batch) {
      switch (msg.kind) {
        case "event": {
          const fatal = dispatchEvent(msg.event);
          if (fatal !== null) return fatal;
          break;
        }
        case "hookUpdate": {
          if (!arena.enqueueUpdate(msg)) droppedUpdates++;
          break;
        }
        case "asyncSettled": {
          if (!arena.acceptSettlement(msg)) {
            staleCompletions++;
            break;
          }
          inUserCode++;
          try {
            msg.deliver();
          } catch (e: unknown) {
            const name = arena.get(msg.instanceId)?.componentName ?? "unknown";
            return {
              code: "WEFT_USER_CODE_THROW",
              detail: `<${name}> async effect callback threw: ${describeThrown(e)}`,
            };
          } finally {
            inUserCode--;
          }
          break;
        }
        case "exit":
          return "exit";
        case "fatal":
          return { code: msg.code, detail: msg.detail };
      }
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Render pass
  // ---------------------------------------------------------------------------

  /** One pass: render, draw, run effects. False when the loop must stop. */
  async function renderPass(): Promise<boolean> {
    setPhase("rendering");
    const renderStart = monotonicNow();
    const renderToken = perfMarkStart("render");
    inUserCode++;
    let result: ReturnType<typeof commitRender>;
    try {
      result = commitRender(tree, root, {
        allocator,
        arena,
        services,
        maxDepth: config.maxDepth,
        warn,
      });
    } finally {
      inUserCode--;
    }
    perfMarkEnd("render", renderToken);
    const renderMs = monotonicNow() - renderStart;

    if (!result.ok) {
      await doFatal(result.fatal);
      return false;
    }
    const commit = result.value;

    setPhase("committing");
    const pass = passes + 1;
    const drawToken = perfMarkStart("draw");
    try {
      await backend.draw(Object.freeze({ pass, tree: commit.tree, patch: commit.patch, viewport }));
    } catch (e: unknown) {
      await doFatal({
        code: "WEFT_BACKEND_ERROR",
        detail: `backend.draw rejected: ${describeThrown(e)}`,
      });
      return false;
    }
    perfMarkEnd("draw", drawToken);
    if (sm.state !== "Running") return false;

    passes = pass;
    tree = commit.tree;
    mounted = true;

    setPhase("runningEffects");
    const effectsToken = perfMarkStart("effects");
    inUserCode++;
    let effects: ReturnType<typeof runCommitEffects>;
    try {
      effects = runCommitEffects(commit, arena, onCleanupError);
    } finally {
      inUserCode--;
    }
    perfMarkEnd("effects", effectsToken);
    if (!effects.ok) {
      await doFatal(effects.fatal);
      return false;
    }

    const onCommit = config.onCommit;
    if (onCommit !== undefined) {
      try {
        onCommit(
          Object.freeze({
            pass,
            patch: commit.patch,
            lifecycle: commit.lifecycle,
            stats: commit.stats,
            effects: effects.value,
            renderMs,
          }),
        );
      } catch (e: unknown) {
        warn(formatWarning("loop", `onCommit threw: ${describeThrown(e)}`));
      }
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Loop
  // ---------------------------------------------------------------------------

  /** Drain, render while work remains. False when the loop must stop. */
  async function runTurn(): Promise<boolean> {
    const turnToken = perfMarkStart("turn");
    let renders = 0;
    try {
      for (;;) {
        for (let batch = inbox.drain(); batch.length > 0; batch = inbox.drain()) {
          const next = processBatch(batch);
          if (next === "exit") {
            await shutdown();
            return false;
          }
          if (next !== null) {
            await doFatal(next);
            return false;
          }
        }

        if (mounted && arena.dirtyIds().length === 0) return true;

        renders++;
        if (renders > config.maxConsecutiveRenders) {
          await doFatal({
            code: "WEFT_RENDER_LOOP",
            detail: `${String(config.maxConsecutiveRenders)} consecutive render passes without reaching idle`,
          });
          return false;
        }
        if (!(await renderPass())) return false;
        if (inbox.size() === 0) return true;
      }
    } finally {
      perfMarkEnd("turn", turnToken);
    }
  }

  async function runLoop(): Promise<void> {
    let keepRunning = await runTurn();
    while (keepRunning && sm.state === "Running") {
      if (inbox.size() === 0) enterIdle();
      await inbox.wait();
      if (sm.state !== "Running") return;
      busy = true;
      keepRunning = await runTurn();
    }
  }

  async function pumpEvents(): Promise<void> {
    while (sm.state === "Running") {
      let event: TerminalEvent | null;
      try {
        event = await backend.pollEvent();
      } catch (e: unknown) {
        inbox.push({
          kind: "fatal",
          code: "WEFT_BACKEND_ERROR",
          detail: `backend.pollEvent rejected: ${describeThrown(e)}`,
        });
        return;
      }
      if (event === null) {
        inbox.push({ kind: "exit" });
        return;
      }
      inbox.push({ kind: "event", event });
    }
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  const app: App = {
    async start(): Promise<void> {
      assertNotReentrant("start");
      if (starting) throwCode("WEFT_INVALID_STATE", "start: already starting");
      sm.assertOneOf(["Created"], "start: must be Created");

      starting = true;
      try {
        await backend.start();
      } catch (e: unknown) {
        starting = false;
        throwCode("WEFT_BACKEND_ERROR", `backend.start rejected: ${describeThrown(e)}`);
      }

      // The backend is live from here on; a failure must still tear it down.
      try {
        viewport = backend.dimensions();
      } catch (e: unknown) {
        await releaseBackend();
        sm.dispose();
        throwCode("WEFT_BACKEND_ERROR", `backend.dimensions threw: ${describeThrown(e)}`);
      } finally {
        starting = false;
      }

      sm.toRunning();
      void pumpEvents();
      void runLoop().catch((e: unknown) =>
        doFatal({ code: "WEFT_INVALID_STATE", detail: `loop failed: ${describeThrown(e)}` }),
      );
    },

    async stop(): Promise<void> {
      if (outcome !== null) return;
      sm.assertOneOf(["Running", "Stopped", "Faulted"], "stop: must be Running");
      const finished = new Promise<void>((resolve) => {
        finishWaiters.push(resolve);
      });
      requestExit();
      await finished;
    },

    dispose(): void {
      assertNotReentrant("dispose");
      const st: AppState = sm.state;
      if (st === "Disposed") return;
      if (st === "Running") {
        disposeAfterExit = true;
        requestExit();
        return;
      }
      if (starting) throwCode("WEFT_INVALID_STATE", "dispose: start in progress");
      if (st === "Created") {
        try {
          backend.dispose();
        } catch (e: unknown) {
          warn(formatWarning("loop", `backend.dispose threw: ${describeThrown(e)}`));
        }
      }
      sm.dispose();
    },

    onEvent(handler: EventHandler): () => void {
      return addSlot(handlers, handler);
    },

    requestExit,

    whenIdle(): Promise<void> {
      if (sm.state !== "Running") return Promise.resolve();
      if (!busy && inbox.size() === 0) return Promise.resolve();
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    waitForExit(): Promise<void> {
      if (outcome !== null) {
        return outcome.error === null ? Promise.resolve() : Promise.reject(outcome.error);
      }
      return new Promise<void>((resolve, reject) => {
        exitWaiters.push({ resolve, reject });
      });
    },

    getState(): AppState {
      return sm.state;
    },

    getPhase(): LoopPhase {
      return phase;
    },

    getTree(): CommitTree | null {
      return tree;
    },

    getMetrics(): AppMetrics {
      return Object.freeze({ passes, events: eventCount, staleCompletions, droppedUpdates });
    },
  };

  return Object.freeze(app);
}
