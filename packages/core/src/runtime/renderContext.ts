/**
 * packages/core/src/runtime/renderContext.ts — Render context passed to components.
 *
 * Why: Hooks need to know which instance is rendering. Instead of an ambient
 * "current component" global, the reconciler passes this object explicitly
 * to every component call, which keeps rendering reentrant and testable.
 */

import type { TerminalEventHandler, Viewport } from "../events.js";
import type { InstanceId } from "./instance.js";
import type { HookContext } from "./instances.js";

/** Loop-provided services reachable from components and effects. */
export type RuntimeServices = Readonly<{
  /**
   * Subscribe to terminal events. Handlers run in subscription order, after
   * app-level handlers and before the render pass the event leads to.
   * Call from an effect; returns the unsubscribe function.
   */
  subscribeEvents: (handler: TerminalEventHandler) => () => void;
  /** Current terminal size. */
  getViewport: () => Viewport;
  /** Ask the loop to exit once the current turn completes. */
  requestExit: () => void;
}>;

/**
 * Second argument of every component.
 *
 * @example
 * ```ts
 * const Counter: Component = (_props, ctx) => {
 *   const [count, setCount] = ctx.useState(0);
 *   ctx.useEffect(() => ctx.subscribeEvents((ev) => {
 *     if (ev.kind === "keyPress" && ev.key === "+") setCount((c) => c + 1);
 *   }), []);
 *   return element("text", { value: `count: ${count}` });
 * };
 * ```
 */
export type RenderContext = HookContext &
  RuntimeServices &
  Readonly<{
    instanceId: InstanceId;
    componentName: string;
  }>;

const DEFAULT_VIEWPORT: Viewport = Object.freeze({ cols: 80, rows: 24 });

/** Services for rendering outside an app (tests, one-shot commits). */
export const DETACHED_SERVICES: RuntimeServices = Object.freeze({
  subscribeEvents: () => () => {},
  getViewport: () => DEFAULT_VIEWPORT,
  requestExit: () => {},
});

export function createRenderContext(
  hooks: HookContext,
  services: RuntimeServices,
  instanceId: InstanceId,
  componentName: string,
): RenderContext {
  return Object.freeze({
    ...hooks,
    ...services,
    instanceId,
    componentName,
  });
}
