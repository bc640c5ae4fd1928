/**
 * Terminal backend interface.
 *
 * The backend owns the terminal: it turns committed host nodes into cells and
 * produces input events. The runtime only talks to it through this contract.
 */

import type { TerminalEvent, Viewport } from "./events.js";
import type { PatchOp } from "./runtime/patch.js";
import type { CommitTree } from "./runtime/tree.js";

/** One committed render pass handed to the backend. */
export type CommitFrame = Readonly<{
  /** Monotonic pass number, starting at 1. */
  pass: number;
  /** The tree after this pass; read inserted subtrees from here. */
  tree: CommitTree;
  /** Ordered operations turning the previous tree into `tree`. */
  patch: readonly PatchOp[];
  viewport: Viewport;
}>;

/**
 * Backend contract.
 *
 * Rules:
 * - `start()` is called once before any draw or poll.
 * - `draw()` resolves once the frame is applied; a rejection is fatal.
 * - `pollEvent()` resolves with the next event, or `null` once input is
 *   closed. `stop()` MUST resolve a pending poll with `null`.
 * - `stop()` restores terminal state; `dispose()` frees resources. The
 *   runtime calls both, in that order, on every exit path.
 */
export interface TerminalBackend {
  start(): Promise<void>;
  stop(): Promise<void>;
  dispose(): void;
  draw(frame: CommitFrame): Promise<void>;
  pollEvent(): Promise<TerminalEvent | null>;
  dimensions(): Viewport;
}
