/**
 * Error codes and error types for Weft.
 */

import type { InstanceId } from "./runtime/instance.js";

// =============================================================================
// WeftErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as WeftError instances.
 */
export type WeftErrorCode =
  | "WEFT_INVALID_STATE"
  | "WEFT_REENTRANT_CALL"
  | "WEFT_INVALID_PROPS"
  | "WEFT_DUPLICATE_KEY"
  | "WEFT_HOOK_ORDER"
  | "WEFT_RENDER_LOOP"
  | "WEFT_BACKEND_ERROR"
  | "WEFT_USER_CODE_THROW";

// =============================================================================
// WeftError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class WeftError extends Error {
  override readonly name: string = "WeftError";
  readonly code: WeftErrorCode;

  constructor(code: WeftErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WeftError);
    }
  }
}

/**
 * Rules-of-hooks violation: the hook called at `slotIndex` does not match the
 * kind recorded by the previous render, or the hook count changed.
 */
export class HookOrderError extends WeftError {
  override readonly name: string = "HookOrderError";
  readonly instanceId: InstanceId;
  readonly componentName: string;
  readonly slotIndex: number;

  constructor(instanceId: InstanceId, componentName: string, slotIndex: number, detail: string) {
    super(
      "WEFT_HOOK_ORDER",
      `Hook order violation in <${componentName}> (instance ${String(instanceId)}) at slot ${String(
        slotIndex,
      )}: ${detail}`,
    );
    this.instanceId = instanceId;
    this.componentName = componentName;
    this.slotIndex = slotIndex;
  }
}

/**
 * Fatal diagnostic carried by result objects instead of a thrown error.
 * `C` narrows the codes a stage can report.
 */
export type WeftFatal<C extends WeftErrorCode = WeftErrorCode> = Readonly<{
  code: C;
  detail: string;
  /** The thrown error, when the fatal came from one. */
  error?: WeftError | undefined;
}>;

/** Convert anything thrown by user code into a single-line detail string. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}
