import type { TerminalBackend } from "../backend.js";
import type { WarnFn } from "../debug/warn.js";
import type { EventHandler } from "../events.js";
import type { CommitStats, LifecycleReport } from "../runtime/commit.js";
import type { EffectRunStats } from "../runtime/effects.js";
import type { PatchOp } from "../runtime/patch.js";
import type { CommitTree } from "../runtime/tree.js";
import type { VNode } from "../vnode.js";
import type { AppState, LoopPhase } from "./stateMachine.js";

/** Per-pass metrics delivered to `config.onCommit` after effects ran. */
export type CommitMetrics = Readonly<{
  pass: number;
  patch: readonly PatchOp[];
  lifecycle: LifecycleReport;
  stats: CommitStats;
  effects: EffectRunStats;
  /** Wall time of the render pass (reconcile + component renders), ms. */
  renderMs: number;
}>;

export type AppConfig = Readonly<{
  /** Render passes allowed without reaching idle. Default 100. */
  maxConsecutiveRenders?: number;
  /** Hard limit on tree depth. Default 500. */
  maxDepth?: number;
  /** Default true; `false` silences dev warnings. */
  devWarnings?: boolean;
  /** Receives dev warnings instead of console.warn. */
  onWarning?: WarnFn;
  onCommit?: (metrics: CommitMetrics) => void;
}>;

export type ResolvedAppConfig = Readonly<{
  maxConsecutiveRenders: number;
  maxDepth: number;
  devWarnings: boolean;
  onWarning: WarnFn | undefined;
  onCommit: ((metrics: CommitMetrics) => void) | undefined;
}>;

export type AppMetrics = Readonly<{
  /** Committed render passes. */
  passes: number;
  /** Terminal events dispatched. */
  events: number;
  /** Async completions discarded because their run was superseded. */
  staleCompletions: number;
  /** Updates posted by setters of unmounted instances. */
  droppedUpdates: number;
}>;

export type CreateAppOptions = Readonly<{
  backend: TerminalBackend;
  root: VNode;
  config?: AppConfig;
}>;

export interface App {
  /** Start the backend and mount the root. */
  start(): Promise<void>;
  /** Request a clean exit; resolves once teardown finished. */
  stop(): Promise<void>;
  dispose(): void;
  /** App-level handler; runs before component subscribers. */
  onEvent(handler: EventHandler): () => void;
  requestExit(): void;
  /** Resolves when the loop is idle with an empty inbox, or has exited. */
  whenIdle(): Promise<void>;
  /** Resolves on a clean exit; rejects with the fatal WeftError otherwise. */
  waitForExit(): Promise<void>;
  getState(): AppState;
  getPhase(): LoopPhase;
  getTree(): CommitTree | null;
  getMetrics(): AppMetrics;
}
