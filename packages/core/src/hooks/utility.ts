import type { HookContext } from "../runtime/instances.js";

/**
 * Minimal context required by `useDebounce`.
 */
type DebounceHookContext = Pick<HookContext, "useEffect" | "useState">;

/**
 * Minimal context required by `usePrevious`.
 */
type PreviousHookContext = Pick<HookContext, "useEffect" | "useRef">;

type TimerHookContext = Pick<HookContext, "useEffect" | "useRef">;

let nextGeneratedId = 0;

/**
 * Return a debounced copy of a value.
 *
 * The returned value updates only after `delayMs` has elapsed without a new
 * input value. Non-positive or non-finite delays apply on the next effect pass.
 */
export function useDebounce<T>(ctx: DebounceHookContext, value: T, delayMs: number): T {
  // Wrap to preserve function values; useState treats function inputs as
  // lazy initializers.
  const [debounced, setDebounced] = ctx.useState<T>(() => value);

  ctx.useEffect(() => {
    if (!Number.isFinite(delayMs) || delayMs <= 0) {
      setDebounced(() => value);
      return;
    }

    const timeoutId: ReturnType<typeof setTimeout> = setTimeout(() => {
      setDebounced(() => value);
    }, delayMs);

    return () => {
      clearTimeout(timeoutId);
    };
  }, [value, delayMs]);

  return debounced;
}

/**
 * Track the previous render's value.
 */
export function usePrevious<T>(ctx: PreviousHookContext, value: T): T | undefined {
  const ref = ctx.useRef<T | undefined>(undefined);
  const previousValue = ref.current;

  ctx.useEffect(() => {
    ref.current = value;
  }, [value]);

  return previousValue;
}

/**
 * Stable id for the lifetime of the instance, unique within the process.
 * The prefix is read on mount only.
 */
export function useId(ctx: Pick<HookContext, "useRef">, prefix = "weft"): string {
  const ref = ctx.useRef<string | null>(null);
  if (ref.current === null) {
    nextGeneratedId++;
    ref.current = `${prefix}-${String(nextGeneratedId)}`;
  }
  return ref.current;
}

/**
 * Return a function with a stable identity that always calls the handler
 * from the latest render. Safe to list in (or leave out of) effect deps.
 */
export function useEffectEvent<Args extends unknown[], R>(
  ctx: Pick<HookContext, "useRef">,
  handler: (...args: Args) => R,
): (...args: Args) => R {
  const handlerRef = ctx.useRef(handler);
  handlerRef.current = handler;

  const stableRef = ctx.useRef<((...args: Args) => R) | null>(null);
  if (stableRef.current === null) {
    stableRef.current = (...args: Args) => handlerRef.current(...args);
  }
  return stableRef.current;
}

/**
 * Call `fn` once, `ms` after mount. Changing `ms` restarts the timer;
 * non-positive or non-finite delays disable it.
 */
export function useTimeout(ctx: TimerHookContext, fn: () => void, ms: number): void {
  const callbackRef = ctx.useRef(fn);

  ctx.useEffect(() => {
    callbackRef.current = fn;
  }, [fn]);

  ctx.useEffect(() => {
    if (!Number.isFinite(ms) || ms <= 0) {
      return;
    }

    const timeoutId: ReturnType<typeof setTimeout> = setTimeout(() => {
      callbackRef.current();
    }, ms);

    return () => {
      clearTimeout(timeoutId);
    };
  }, [ms]);
}

/**
 * Call `fn` every `ms` milliseconds while mounted.
 *
 * The latest `fn` is used without resetting the interval.
 */
export function useInterval(ctx: TimerHookContext, fn: () => void, ms: number): void {
  const callbackRef = ctx.useRef(fn);

  ctx.useEffect(() => {
    callbackRef.current = fn;
  }, [fn]);

  ctx.useEffect(() => {
    if (!Number.isFinite(ms) || ms <= 0) {
      return;
    }

    const intervalId: ReturnType<typeof setInterval> = setInterval(() => {
      callbackRef.current();
    }, ms);

    return () => {
      clearInterval(intervalId);
    };
  }, [ms]);
}

type ResettableTimerHookContext = TimerHookContext & Pick<HookContext, "useState" | "useCallback">;

/** Zero runs on the next tick; non-finite or negative disables the timer. */
function timerDelay(ms: number): number | null {
  if (!Number.isFinite(ms) || ms < 0) return null;
  return Math.max(1, ms);
}

/**
 * Like `useTimeout`, but the returned function restarts the countdown.
 * After the timer has fired, a reset arms it again.
 */
export function useTimeoutWithReset(
  ctx: ResettableTimerHookContext,
  fn: () => void,
  ms: number,
): () => void {
  const callbackRef = ctx.useRef(fn);
  callbackRef.current = fn;
  const [resets, setResets] = ctx.useState(0);

  ctx.useEffect(() => {
    const wait = timerDelay(ms);
    if (wait === null) return;
    const timeoutId: ReturnType<typeof setTimeout> = setTimeout(() => {
      callbackRef.current();
    }, wait);
    return () => {
      clearTimeout(timeoutId);
    };
  }, [ms, resets]);

  return ctx.useCallback(() => {
    setResets((n) => n + 1);
  }, [setResets]);
}

export type TimeoutControls = Readonly<{
  /** Arm the timer, restarting it if it is already running. */
  start: () => void;
  cancel: () => void;
  /** True from `start` until the timer fires or is cancelled. */
  isActive: boolean;
}>;

/** A timeout that does nothing until `start` is called. */
export function useTimeoutControlled(
  ctx: ResettableTimerHookContext,
  fn: () => void,
  ms: number,
): TimeoutControls {
  const callbackRef = ctx.useRef(fn);
  callbackRef.current = fn;
  const [armed, setArmed] = ctx.useState<Readonly<{ active: boolean; run: number }>>({
    active: false,
    run: 0,
  });

  ctx.useEffect(() => {
    const wait = timerDelay(ms);
    if (!armed.active || wait === null) return;
    const timeoutId: ReturnType<typeof setTimeout> = setTimeout(() => {
      setArmed((prev) => (prev.run === armed.run ? { active: false, run: prev.run } : prev));
      callbackRef.current();
    }, wait);
    return () => {
      clearTimeout(timeoutId);
    };
  }, [ms, armed]);

  const start = ctx.useCallback(() => {
    setArmed((prev) => ({ active: true, run: prev.run + 1 }));
  }, [setArmed]);
  const cancel = ctx.useCallback(() => {
    setArmed((prev) => (prev.active ? { active: false, run: prev.run } : prev));
  }, [setArmed]);

  return { start, cancel, isActive: armed.active };
}
