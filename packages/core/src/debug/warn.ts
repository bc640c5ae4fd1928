/**
 * packages/core/src/debug/warn.ts — Development warnings.
 *
 * Why: Core avoids Node imports, so the environment and console are reached
 * through globalThis. Callers that need to capture warnings (tests, custom
 * loggers) pass their own `warn` function instead.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

/** Warning area, rendered as a `[weft][area]` prefix. */
export type WarnArea = "commit" | "hooks" | "effects" | "loop" | "config";

export type WarnFn = (message: string) => void;

export function formatWarning(area: WarnArea, message: string): string {
  return `[weft][${area}] ${message}`;
}

/** Write to console.warn outside production. */
export function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}
