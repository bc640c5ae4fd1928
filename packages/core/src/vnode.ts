/**
 * packages/core/src/vnode.ts — VNode model and construction API.
 *
 * Why: A VNode is the immutable description of one UI node, built fresh on
 * every render pass and discarded once diffed. The variant set is closed and
 * dispatched on `kind`; only host element types are open-ended strings.
 *
 * The construction functions here are what desugared markup calls.
 */

import { WeftError } from "./errors.js";
import type { RenderContext } from "./runtime/renderContext.js";

/** Explicit sibling identity. */
export type Key = string | number;

export type KeyProp = Readonly<{ key?: Key | undefined }>;

export type ChildrenProp = Readonly<{ children?: readonly VNode[] | undefined }>;

/** Props of a host element: a plain string-keyed mapping. */
export type HostProps = Readonly<Record<string, unknown>>;

export type HostVNode = Readonly<{
  kind: "host";
  type: string;
  key: Key | undefined;
  props: HostProps;
  children: readonly VNode[];
}>;

export type ComponentVNode = Readonly<{
  kind: "component";
  /** Component function; identity is what the reconciler compares. */
  type: AnyComponent;
  name: string;
  key: Key | undefined;
  /** Props as passed to the component, including `children`. */
  props: object;
  /** Invoke the component with its typed props. */
  render: (ctx: RenderContext) => VNodeChild;
  /** Present on memo components: true when `prev` carries equal props. */
  canSkip: ((prev: ComponentVNode) => boolean) | undefined;
}>;

export type FragmentVNode = Readonly<{
  kind: "fragment";
  key: Key | undefined;
  children: readonly VNode[];
}>;

export type TextVNode = Readonly<{
  kind: "text";
  text: string;
}>;

export type EmptyVNode = Readonly<{
  kind: "empty";
}>;

export type VNode = HostVNode | ComponentVNode | FragmentVNode | TextVNode | EmptyVNode;

/** Anything a component may return or pass as a child. */
export type VNodeChild = VNode | string | number | boolean | null | undefined | readonly VNodeChild[];

/** Type-erased component identity. */
export type AnyComponent = ((props: never, ctx: RenderContext) => VNodeChild) & {
  displayName?: string | undefined;
};

/** Memoization hooks attached to a component by `memo()`. */
export type MemoCompare<P> = Readonly<{
  remember: (vnode: ComponentVNode, props: Readonly<P>) => void;
  matches: (prev: ComponentVNode, next: Readonly<P>) => boolean;
}>;

/**
 * A function component: a pure function of its props and the hook calls it
 * makes on `ctx`.
 */
export type Component<P extends object = object> = ((
  props: Readonly<P> & ChildrenProp,
  ctx: RenderContext,
) => VNodeChild) & {
  displayName?: string | undefined;
  memoCompare?: MemoCompare<P> | undefined;
};

const EMPTY: EmptyVNode = Object.freeze({ kind: "empty" });
const NO_CHILDREN: readonly VNode[] = Object.freeze([]);

function readKey(v: unknown): Key | undefined {
  if (v === undefined || v === null) return undefined;
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isInteger(v)) return v;
  throw new WeftError(
    "WEFT_INVALID_PROPS",
    `key must be a string or an integer, got ${typeof v === "number" ? String(v) : typeof v}`,
  );
}

function isChildList(child: VNodeChild): child is readonly VNodeChild[] {
  return Array.isArray(child);
}

/** Key of a VNode, if its kind can carry one. */
export function vnodeKey(v: VNode): Key | undefined {
  switch (v.kind) {
    case "host":
    case "component":
    case "fragment":
      return v.key;
    default:
      return undefined;
  }
}

/** Human-readable type name used in diagnostics. */
export function vnodeTypeName(v: VNode): string {
  switch (v.kind) {
    case "host":
      return v.type;
    case "component":
      return v.name;
    default:
      return `#${v.kind}`;
  }
}

/**
 * Normalize a child value into a VNode.
 * Strings and numbers become text; null, undefined and booleans become
 * Empty (so sibling positions stay stable); arrays become unkeyed fragments.
 */
export function normalizeChild(child: VNodeChild): VNode {
  if (child === null || child === undefined || typeof child === "boolean") return EMPTY;
  if (typeof child === "string") return text(child);
  if (typeof child === "number") return text(String(child));
  if (isChildList(child)) return fragment(child);
  return child;
}

export function normalizeChildren(children: readonly VNodeChild[]): readonly VNode[] {
  if (children.length === 0) return NO_CHILDREN;
  return Object.freeze(children.map(normalizeChild));
}

export function text(value: string | number): TextVNode {
  return Object.freeze({ kind: "text", text: String(value) });
}

export function empty(): EmptyVNode {
  return EMPTY;
}

export function fragment(children: readonly VNodeChild[], key?: Key): FragmentVNode {
  return Object.freeze({
    kind: "fragment",
    key: readKey(key),
    children: normalizeChildren(children),
  });
}

function componentName(type: AnyComponent): string {
  if (typeof type.displayName === "string" && type.displayName.length > 0) return type.displayName;
  return type.name.length > 0 ? type.name : "Anonymous";
}

function hostElement(type: string, props: object, children: readonly VNode[]): HostVNode {
  let key: Key | undefined;
  const hostProps: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(props)) {
    if (name === "key") {
      key = readKey(value);
      continue;
    }
    if (name === "children") continue;
    hostProps[name] = value;
  }
  return Object.freeze({
    kind: "host",
    type,
    key,
    props: Object.freeze(hostProps),
    children,
  });
}

/**
 * Build an element.
 *
 * A string `type` builds a host element whose props are diffed key by key.
 * A component `type` builds a component element; the component receives
 * `props` without `key`, plus the normalized `children`. `props.key` sets
 * sibling identity.
 *
 * @example
 * ```ts
 * element("list", { key: "todos" }, items.map((t) => element(TodoRow, { key: t.id, todo: t })));
 * ```
 */
export function element(
  type: string,
  props?: HostProps | null,
  children?: readonly VNodeChild[],
): HostVNode;
export function element<P extends object>(
  type: Component<P>,
  props: P & KeyProp,
  children?: readonly VNodeChild[],
): ComponentVNode;
export function element<P extends object>(
  type: string | Component<P>,
  props?: (P & KeyProp) | null,
  children: readonly VNodeChild[] = [],
): VNode {
  const normalized = normalizeChildren(children);
  if (typeof type === "string") {
    if (type.length === 0) {
      throw new WeftError("WEFT_INVALID_PROPS", "host element type must be a non-empty string");
    }
    return hostElement(type, props ?? {}, normalized);
  }
  if (props === null || props === undefined) {
    throw new WeftError(
      "WEFT_INVALID_PROPS",
      `component <${componentName(type)}> requires a props object`,
    );
  }
  return componentElement(type, props, normalized);
}

function componentElement<P extends object>(
  type: Component<P>,
  props: P & KeyProp,
  children: readonly VNode[],
): ComponentVNode {
  const key = readKey(props.key);
  const ownProps: P & { key?: Key | undefined } = { ...props };
  delete ownProps.key;
  const fullProps: Readonly<P> & ChildrenProp = Object.freeze({ ...ownProps, children });
  const memoCompare = type.memoCompare;

  const vnode: ComponentVNode = Object.freeze({
    kind: "component",
    type,
    name: componentName(type),
    key,
    props: fullProps,
    render: (ctx: RenderContext) => type(fullProps, ctx),
    canSkip:
      memoCompare === undefined
        ? undefined
        : (prev: ComponentVNode) => memoCompare.matches(prev, fullProps),
  });
  memoCompare?.remember(vnode, fullProps);
  return vnode;
}

/** Shallow `Object.is` comparison of two props objects. */
export function shallowEqualProps(a: object, b: object): boolean {
  if (a === b) return true;
  const aEntries = Object.entries(a);
  const bEntries = Object.entries(b);
  if (aEntries.length !== bEntries.length) return false;
  const bMap = new Map<string, unknown>(bEntries);
  for (const [name, value] of aEntries) {
    if (!bMap.has(name) || !Object.is(bMap.get(name), value)) return false;
  }
  return true;
}

/**
 * Mark a component as pure: a re-render driven only by its parent is skipped
 * while `areEqual(prevProps, nextProps)` holds (shallow equality by default)
 * and the component has no pending update of its own.
 */
export function memo<P extends object>(
  component: Component<P>,
  areEqual: (prev: Readonly<P>, next: Readonly<P>) => boolean = shallowEqualProps,
): Component<P> {
  const seen = new WeakMap<ComponentVNode, Readonly<P>>();
  const memoCompare: MemoCompare<P> = Object.freeze({
    remember(vnode: ComponentVNode, props: Readonly<P>): void {
      seen.set(vnode, props);
    },
    matches(prev: ComponentVNode, next: Readonly<P>): boolean {
      const prevProps = seen.get(prev);
      return prevProps !== undefined && areEqual(prevProps, next);
    },
  });
  const wrapped: Component<P> = (props, ctx) => component(props, ctx);
  wrapped.displayName = `Memo(${componentName(component)})`;
  wrapped.memoCompare = memoCompare;
  return wrapped;
}
