/**
 * Event types for the Weft runtime.
 */

// =============================================================================
// Terminal Events (delivered by the backend)
// =============================================================================

export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

export type MouseButton = "left" | "middle" | "right" | "none";

/** Terminal size in cells. */
export type Viewport = Readonly<{ cols: number; rows: number }>;

/**
 * Input and resize events produced by a terminal backend.
 * Key names are printable characters ("a", "?") or named keys ("enter",
 * "escape", "up", "f5", ...).
 */
export type TerminalEvent =
  | Readonly<{ kind: "keyPress"; key: string; modifiers: Modifiers }>
  | Readonly<{ kind: "keyRelease"; key: string; modifiers: Modifiers }>
  | Readonly<{ kind: "mouseDown"; x: number; y: number; button: MouseButton; modifiers: Modifiers }>
  | Readonly<{ kind: "mouseUp"; x: number; y: number; button: MouseButton; modifiers: Modifiers }>
  | Readonly<{ kind: "mouseDrag"; x: number; y: number; button: MouseButton; modifiers: Modifiers }>
  | Readonly<{ kind: "resize"; cols: number; rows: number }>;

export type KeyEvent = Extract<TerminalEvent, { kind: "keyPress" | "keyRelease" }>;
export type MouseEvent = Extract<TerminalEvent, { kind: "mouseDown" | "mouseUp" | "mouseDrag" }>;
export type ResizeEvent = Extract<TerminalEvent, { kind: "resize" }>;

export type TerminalEventHandler = (event: TerminalEvent) => void;

export const NO_MODIFIERS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export function isKeyEvent(ev: TerminalEvent): ev is KeyEvent {
  return ev.kind === "keyPress" || ev.kind === "keyRelease";
}

export function isMouseEvent(ev: TerminalEvent): ev is MouseEvent {
  return ev.kind === "mouseDown" || ev.kind === "mouseUp" || ev.kind === "mouseDrag";
}

// =============================================================================
// UiEvent Union (emitted by the app to onEvent handlers)
// =============================================================================

/**
 * Events emitted by the app runtime to registered handlers.
 *
 * Terminal events reach app handlers before component subscribers, and both
 * before the render pass that reflects the state they changed.
 */
export type UiEvent =
  | Readonly<{
      kind: "terminal";
      event: TerminalEvent;
    }>
  | Readonly<{
      /**
       * Fatal runtime error.
       *
       * When a fatal error occurs while Running:
       * 1. This event is emitted to all handlers in registration order
       * 2. App transitions to Faulted state
       * 3. Backend is stopped and disposed
       */
      kind: "fatal";
      code: string;
      detail: string;
    }>;

export type EventHandler = (ev: UiEvent) => void;
