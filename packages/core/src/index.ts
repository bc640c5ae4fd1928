/**
 * @weft-tui/core
 *
 * Reactive terminal UI runtime: VNodes, hooks, reconciliation into patches,
 * effects and the render/event loop.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { WeftError, HookOrderError, describeThrown } from "./errors.js";
export type { WeftErrorCode, WeftFatal } from "./errors.js";

// =============================================================================
// VNodes
// =============================================================================

export {
  element,
  fragment,
  text,
  empty,
  memo,
  shallowEqualProps,
  normalizeChild,
  normalizeChildren,
  vnodeKey,
  vnodeTypeName,
} from "./vnode.js";
export type {
  AnyComponent,
  ChildrenProp,
  Component,
  ComponentVNode,
  EmptyVNode,
  FragmentVNode,
  HostProps,
  HostVNode,
  Key,
  KeyProp,
  MemoCompare,
  TextVNode,
  VNode,
  VNodeChild,
} from "./vnode.js";

// =============================================================================
// Events and backend contract
// =============================================================================

export { NO_MODIFIERS, isKeyEvent, isMouseEvent } from "./events.js";
export type {
  EventHandler,
  KeyEvent,
  Modifiers,
  MouseButton,
  MouseEvent,
  ResizeEvent,
  TerminalEvent,
  TerminalEventHandler,
  UiEvent,
  Viewport,
} from "./events.js";
export type { CommitFrame, TerminalBackend } from "./backend.js";

// =============================================================================
// Runtime
// =============================================================================

export { ROOT_PARENT_ID, createInstanceIdAllocator } from "./runtime/instance.js";
export type { InstanceId, InstanceIdAllocator } from "./runtime/instance.js";

export { createHookArena, depsEqual } from "./runtime/instances.js";
export type {
  ArenaMessage,
  AsyncResult,
  AsyncSettledMessage,
  Deps,
  Dispatch,
  EffectCleanup,
  HookArena,
  HookContext,
  HookKind,
  HookUpdateMessage,
  InstanceState,
  StateSetter,
} from "./runtime/instances.js";

export { createContext } from "./runtime/context.js";
export type { Context } from "./runtime/context.js";

export { DETACHED_SERVICES } from "./runtime/renderContext.js";
export type { RenderContext, RuntimeServices } from "./runtime/renderContext.js";

export { reconcileChildren } from "./runtime/reconcile.js";
export type { ReconcileChildrenResult, ReconciledChild } from "./runtime/reconcile.js";

export { applyReorder, diffProps } from "./runtime/patch.js";
export type { PatchOp, PatchOpKind, PropDiff, ReorderMove } from "./runtime/patch.js";

export { collectSubtree, flattenHostTree, getCommittedNode } from "./runtime/tree.js";
export type { CommitTree, CommittedNode, HostTreeNode } from "./runtime/tree.js";

export { DEFAULT_MAX_DEPTH, commitRender } from "./runtime/commit.js";
export type {
  CommitOk,
  CommitOptions,
  CommitResult,
  CommitStats,
  EffectBatch,
  LifecycleReport,
} from "./runtime/commit.js";

export { runCommitEffects, unmountTree } from "./runtime/effects.js";
export type { EffectRunResult, EffectRunStats } from "./runtime/effects.js";

// =============================================================================
// App
// =============================================================================

export { createApp, resolveAppConfig } from "./app/createApp.js";
export { render } from "./app/render.js";
export type { RenderOptions } from "./app/render.js";
export type { AppState, LoopPhase } from "./app/stateMachine.js";
export type {
  App,
  AppConfig,
  AppMetrics,
  CommitMetrics,
  CreateAppOptions,
  ResolvedAppConfig,
} from "./app/types.js";

// =============================================================================
// Hooks
// =============================================================================

export {
  useDebounce,
  useEffectEvent,
  useId,
  useInterval,
  usePrevious,
  useTimeout,
  useTimeoutControlled,
  useTimeoutWithReset,
} from "./hooks/utility.js";
export type { TimeoutControls } from "./hooks/utility.js";
export {
  MUTATION_CANCELLED_REASON,
  clearQueryCache,
  getCacheStats,
  mutationBackoff,
  queryBackoff,
  reduceHistory,
  reduceQuery,
  useAsync,
  useHistory,
  useMutation,
  useQuery,
} from "./hooks/data.js";
export type {
  HistoryAction,
  HistoryState,
  MutationOptions,
  MutationState,
  MutationStatus,
  QueryAction,
  QueryCacheStats,
  QueryOptions,
  QueryState,
  QueryStatus,
  UseAsyncState,
  UseHistoryResult,
  UseMutationResult,
  UseQueryResult,
} from "./hooks/data.js";
export {
  matchesShortcut,
  parseShortcut,
  useKeyPress,
  useKeyboard,
  useKeyboardShortcut,
  useMouse,
  useDoubleClick,
  useMouseClick,
  useMouseDrag,
  useMousePosition,
  useResize,
  useTerminalEvent,
  useViewport,
} from "./hooks/input.js";
export type { DragInfo, MousePosition, Shortcut, UseMouseDragResult } from "./hooks/input.js";

// =============================================================================
// Diagnostics
// =============================================================================

export { formatWarning, warnDev } from "./debug/warn.js";
export type { WarnArea, WarnFn } from "./debug/warn.js";
export { PERF_ENABLED, PerfAggregator, perfReset, perfSnapshot } from "./perf/perf.js";
export type { InstrumentationPhase, PerfSnapshot, PhaseStats } from "./perf/perf.js";
