/**
 * packages/core/src/runtime/context.ts — Context propagation.
 *
 * Why: Lets an ancestor hand a value to any descendant without prop drilling.
 * A Provider pushes a frame for the duration of its subtree's traversal; a
 * reader sees the top-most frame for its context on the path from the root,
 * and subscribes to the providing instance so a change of value re-renders it
 * even when everything in between bails out.
 */

import { type Component, fragment } from "../vnode.js";
import type { InstanceId } from "./instance.js";

export type Context<T> = Readonly<{
  id: symbol;
  name: string;
  defaultValue: T;
  Provider: Component<{ value: T }>;
}>;

/** A provided value visible to a subtree. */
export type ContextFrame = Readonly<{
  contextId: symbol;
  providerId: InstanceId;
  value: unknown;
  /** Instances that read this frame; re-rendered when the value changes. */
  subscribers: Set<InstanceId>;
}>;

/**
 * Create a context with a default value used when no Provider is above the
 * reader.
 *
 * @example
 * ```ts
 * const Theme = createContext("dark", "Theme");
 * element(Theme.Provider, { value: "light" }, [element(Toolbar, {})]);
 * // inside Toolbar: const theme = ctx.useContext(Theme);
 * ```
 */
export function createContext<T>(defaultValue: T, name = "Context"): Context<T> {
  const id = Symbol(name);
  const context: Context<T> = Object.freeze({
    id,
    name,
    defaultValue,
    Provider: createProvider<T>(() => context, name),
  });
  return context;
}

function createProvider<T>(getContext: () => Context<T>, name: string): Component<{ value: T }> {
  const Provider: Component<{ value: T }> = (props, ctx) => {
    ctx.useContextProvider(getContext(), props.value);
    return fragment(props.children ?? []);
  };
  Provider.displayName = `${name}.Provider`;
  return Provider;
}

/** Per-render-pass stack of provided values. */
export type ContextFrameStack = Readonly<{
  push: (frame: ContextFrame) => void;
  /** Pop `count` frames pushed by the subtree being left. */
  pop: (count: number) => void;
  /** Top-most frame for `contextId`, if any. */
  lookup: (contextId: symbol) => ContextFrame | undefined;
  depth: () => number;
}>;

export function createContextFrameStack(): ContextFrameStack {
  const frames: ContextFrame[] = [];
  return Object.freeze({
    push(frame: ContextFrame): void {
      frames.push(frame);
    },
    pop(count: number): void {
      frames.length = Math.max(0, frames.length - count);
    },
    lookup(contextId: symbol): ContextFrame | undefined {
      for (let i = frames.length - 1; i >= 0; i--) {
        const frame = frames[i];
        if (frame !== undefined && frame.contextId === contextId) return frame;
      }
      return undefined;
    },
    depth(): number {
      return frames.length;
    },
  });
}
