/**
 * packages/core/src/hooks/input.ts — Input hooks.
 *
 * Each hook subscribes once on mount and always calls the handler from the
 * latest render, so handlers need not be memoized.
 */

import type {
  KeyEvent,
  Modifiers,
  MouseButton,
  MouseEvent,
  ResizeEvent,
  TerminalEvent,
  Viewport,
} from "../events.js";
import type { RenderContext } from "../runtime/renderContext.js";

type InputHookContext = Pick<RenderContext, "useEffect" | "useRef" | "subscribeEvents">;

type ViewportHookContext = InputHookContext & Pick<RenderContext, "useState" | "getViewport">;

type MouseStateHookContext = InputHookContext & Pick<RenderContext, "useState" | "useCallback">;

/** Parsed form of a shortcut such as "ctrl+shift+k". */
export type Shortcut = Readonly<{ key: string; modifiers: Modifiers }>;

const MODIFIER_NAMES: Readonly<Record<string, keyof Modifiers>> = Object.freeze({
  shift: "shift",
  ctrl: "ctrl",
  control: "ctrl",
  alt: "alt",
  option: "alt",
  meta: "meta",
  cmd: "meta",
  super: "meta",
});

/**
 * Parse "mod+mod+key". Modifier names are case-insensitive; the key is
 * lower-cased. Returns null for an empty key or an unknown modifier.
 */
export function parseShortcut(shortcut: string): Shortcut | null {
  const parts = shortcut
    .split("+")
    .map((p) => p.trim().toLowerCase())
    .filter((p) => p.length > 0);
  const key = parts.pop();
  if (key === undefined) return null;

  const modifiers = { shift: false, ctrl: false, alt: false, meta: false };
  for (const part of parts) {
    const name = MODIFIER_NAMES[part];
    if (name === undefined) return null;
    modifiers[name] = true;
  }
  return Object.freeze({ key, modifiers: Object.freeze(modifiers) });
}

/** Exact match: every modifier must agree. */
export function matchesShortcut(ev: KeyEvent, shortcut: Shortcut): boolean {
  if (ev.key.toLowerCase() !== shortcut.key) return false;
  const m = ev.modifiers;
  const s = shortcut.modifiers;
  return m.shift === s.shift && m.ctrl === s.ctrl && m.alt === s.alt && m.meta === s.meta;
}

/** Subscribe to every terminal event while mounted. */
export function useTerminalEvent(
  ctx: InputHookContext,
  handler: (event: TerminalEvent) => void,
): void {
  const handlerRef = ctx.useRef(handler);
  handlerRef.current = handler;

  ctx.useEffect(
    () =>
      ctx.subscribeEvents((event) => {
        handlerRef.current(event);
      }),
    [],
  );
}

/** Key presses and releases. */
export function useKeyboard(ctx: InputHookContext, handler: (event: KeyEvent) => void): void {
  useTerminalEvent(ctx, (event) => {
    if (event.kind === "keyPress" || event.kind === "keyRelease") handler(event);
  });
}

/** Presses of one key (or any of several), regardless of modifiers. */
export function useKeyPress(
  ctx: InputHookContext,
  keys: string | readonly string[],
  handler: (event: KeyEvent) => void,
): void {
  useTerminalEvent(ctx, (event) => {
    if (event.kind !== "keyPress") return;
    const matched = typeof keys === "string" ? event.key === keys : keys.includes(event.key);
    if (matched) handler(event);
  });
}

/**
 * Presses matching a shortcut such as "ctrl+s". An unparsable shortcut
 * never matches.
 */
export function useKeyboardShortcut(
  ctx: InputHookContext,
  shortcut: string,
  handler: (event: KeyEvent) => void,
): void {
  const parsed = parseShortcut(shortcut);
  useTerminalEvent(ctx, (event) => {
    if (parsed === null || event.kind !== "keyPress") return;
    if (matchesShortcut(event, parsed)) handler(event);
  });
}

/** Mouse down, up and drag events. */
export function useMouse(ctx: InputHookContext, handler: (event: MouseEvent) => void): void {
  useTerminalEvent(ctx, (event) => {
    if (event.kind === "mouseDown" || event.kind === "mouseUp" || event.kind === "mouseDrag") {
      handler(event);
    }
  });
}

/** Presses of `button` (mouseDown only); other buttons are ignored. */
export function useMouseClick(
  ctx: InputHookContext,
  handler: (event: MouseEvent) => void,
  button: MouseButton = "left",
): void {
  useTerminalEvent(ctx, (event) => {
    if (event.kind === "mouseDown" && event.button === button) handler(event);
  });
}

/** A cell position. */
export type MousePosition = Readonly<{ x: number; y: number }>;

export type DragInfo = Readonly<{
  /** Button that started the drag; null before the first press. */
  button: MouseButton | null;
  start: MousePosition;
  current: MousePosition;
  /** Between the press and the release. */
  isDragging: boolean;
  /** Set only by the press. */
  isStart: boolean;
  /** Set only by the release. */
  isEnd: boolean;
}>;

const ORIGIN: MousePosition = Object.freeze({ x: 0, y: 0 });

const NO_DRAG: DragInfo = Object.freeze({
  button: null,
  start: ORIGIN,
  current: ORIGIN,
  isDragging: false,
  isStart: false,
  isEnd: false,
});

export type UseMouseDragResult = Readonly<{ drag: DragInfo; reset: () => void }>;

/**
 * Track a press-drag-release gesture. Drags and releases of a button other
 * than the one pressed are ignored.
 */
export function useMouseDrag(ctx: MouseStateHookContext): UseMouseDragResult {
  const [drag, setDrag] = ctx.useState<DragInfo>(NO_DRAG);
  const activeRef = ctx.useRef<Readonly<{ button: MouseButton; start: MousePosition }> | null>(null);

  useMouse(ctx, (event) => {
    const at = { x: event.x, y: event.y };
    if (event.kind === "mouseDown") {
      activeRef.current = { button: event.button, start: at };
      setDrag({
        button: event.button,
        start: at,
        current: at,
        isDragging: true,
        isStart: true,
        isEnd: false,
      });
      return;
    }
    const active = activeRef.current;
    if (active === null || active.button !== event.button) return;
    const ended = event.kind === "mouseUp";
    if (ended) activeRef.current = null;
    setDrag({
      button: active.button,
      start: active.start,
      current: at,
      isDragging: !ended,
      isStart: false,
      isEnd: ended,
    });
  });

  const reset = ctx.useCallback(() => {
    activeRef.current = null;
    setDrag(NO_DRAG);
  }, [setDrag]);

  return { drag, reset };
}

const DEFAULT_DOUBLE_CLICK_MS = 500;

/**
 * Two presses of the same button on the same cell within `maxDelayMs`.
 * A third press starts a new pair.
 */
export function useDoubleClick(
  ctx: InputHookContext,
  handler: (event: MouseEvent) => void,
  maxDelayMs: number = DEFAULT_DOUBLE_CLICK_MS,
): void {
  const lastRef = ctx.useRef<Readonly<{ event: MouseEvent; at: number }> | null>(null);

  useTerminalEvent(ctx, (event) => {
    if (event.kind !== "mouseDown") return;
    const now = Date.now();
    const last = lastRef.current;
    if (
      last !== null &&
      last.event.button === event.button &&
      last.event.x === event.x &&
      last.event.y === event.y &&
      now - last.at <= maxDelayMs
    ) {
      lastRef.current = null;
      handler(event);
      return;
    }
    lastRef.current = { event, at: now };
  });
}

/** Cell of the latest mouse event; (0, 0) until the first one. */
export function useMousePosition(
  ctx: InputHookContext & Pick<RenderContext, "useState">,
): MousePosition {
  const [position, setPosition] = ctx.useState<MousePosition>(ORIGIN);
  useMouse(ctx, (event) => {
    if (event.x !== position.x || event.y !== position.y) setPosition({ x: event.x, y: event.y });
  });
  return position;
}

export function useResize(ctx: InputHookContext, handler: (event: ResizeEvent) => void): void {
  useTerminalEvent(ctx, (event) => {
    if (event.kind === "resize") handler(event);
  });
}

/** Current terminal size; re-renders on resize. */
export function useViewport(ctx: ViewportHookContext): Viewport {
  const [viewport, setViewport] = ctx.useState<Viewport>(() => ctx.getViewport());
  useResize(ctx, (event) => {
    setViewport({ cols: event.cols, rows: event.rows });
  });
  return viewport;
}
