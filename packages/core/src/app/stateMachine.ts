/**
 * packages/core/src/app/stateMachine.ts — App lifecycle and loop phases.
 *
 * Lifecycle: Created → Running → Stopped | Faulted; any → Disposed.
 * Loop phases while Running:
 *   idle → rendering → committing → runningEffects → rendering | idle
 * Any phase may drop to idle when the loop aborts.
 */

import { WeftError } from "../errors.js";

export type AppState = "Created" | "Running" | "Stopped" | "Faulted" | "Disposed";

export type LoopPhase = "idle" | "rendering" | "committing" | "runningEffects";

const PHASE_SUCCESSORS: Readonly<Record<LoopPhase, readonly LoopPhase[]>> = Object.freeze({
  idle: ["rendering"],
  rendering: ["committing"],
  committing: ["runningEffects"],
  runningEffects: ["rendering"],
});

export function canEnterPhase(from: LoopPhase, to: LoopPhase): boolean {
  if (to === "idle") return true;
  return PHASE_SUCCESSORS[from].includes(to);
}

export class AppStateMachine {
  private current: AppState = "Created";

  get state(): AppState {
    return this.current;
  }

  assertOneOf(states: readonly AppState[], message: string): void {
    if (!states.includes(this.current)) {
      throw new WeftError("WEFT_INVALID_STATE", `${message} (state=${this.current})`);
    }
  }

  toRunning(): void {
    this.assertOneOf(["Created"], "toRunning: must be Created");
    this.current = "Running";
  }

  toStopped(): void {
    this.assertOneOf(["Running"], "toStopped: must be Running");
    this.current = "Stopped";
  }

  toFaulted(): void {
    this.assertOneOf(["Running"], "toFaulted: must be Running");
    this.current = "Faulted";
  }

  dispose(): void {
    this.current = "Disposed";
  }
}
