import { describeThrown } from "../errors.js";
import type { HookContext } from "../runtime/instances.js";

/**
 * Minimal context required by `useAsync`.
 */
type AsyncHookContext = Pick<HookContext, "useState" | "useAsyncEffect">;

/**
 * Minimal context required by `useHistory`.
 */
type HistoryHookContext = Pick<HookContext, "useReducer" | "useMemo">;

/**
 * Async state returned by `useAsync`.
 */
export type UseAsyncState<T> = Readonly<{
  status: "pending" | "success" | "error";
  /** Latest successful value; kept while a newer run is pending. */
  value: T | undefined;
  error: unknown;
}>;

const PENDING: UseAsyncState<never> = Object.freeze({
  status: "pending",
  value: undefined,
  error: undefined,
});

/**
 * Run an async task when deps change and track its result.
 *
 * A run superseded by a newer one (or by unmount) is aborted through its
 * signal and its result is discarded.
 */
export function useAsync<T>(
  ctx: AsyncHookContext,
  task: (signal: AbortSignal) => Promise<T>,
  deps: readonly unknown[],
): UseAsyncState<T> {
  const [state, setState] = ctx.useState<UseAsyncState<T>>(PENDING);

  ctx.useAsyncEffect(
    (signal) => {
      setState((prev) =>
        prev.status === "pending" ? prev : { status: "pending", value: prev.value, error: undefined },
      );
      return task(signal);
    },
    deps,
    (result) => {
      setState(
        result.ok
          ? { status: "success", value: result.value, error: undefined }
          : { status: "error", value: undefined, error: result.error },
      );
    },
  );

  return state;
}

export type HistoryState<T> = Readonly<{
  past: readonly T[];
  present: T;
  future: readonly T[];
}>;

export type HistoryAction<T> =
  | Readonly<{ kind: "set"; value: T }>
  | Readonly<{ kind: "undo" }>
  | Readonly<{ kind: "redo" }>
  | Readonly<{ kind: "reset"; value: T }>;

export type UseHistoryResult<T> = Readonly<{
  value: T;
  past: readonly T[];
  future: readonly T[];
  canUndo: boolean;
  canRedo: boolean;
  set: (value: T) => void;
  undo: () => void;
  redo: () => void;
  /** Replace the present value and forget all history. */
  reset: (value: T) => void;
}>;

const DEFAULT_MAX_HISTORY = 100;

function normalizeMaxHistory(v: number): number {
  if (!Number.isFinite(v)) return DEFAULT_MAX_HISTORY;
  return Math.max(1, Math.floor(v));
}

/** Boxed so an element that is itself `undefined` is not mistaken for a miss. */
function entryAt<T>(items: readonly T[], index: number): Readonly<{ value: T }> | undefined {
  if (index < 0 || index >= items.length) return undefined;
  return items.slice(index, index + 1).map((value) => ({ value }))[0];
}

/** Pure history transition; `maxHistory` bounds the length of `past`. */
export function reduceHistory<T>(
  state: HistoryState<T>,
  action: HistoryAction<T>,
  maxHistory: number,
): HistoryState<T> {
  switch (action.kind) {
    case "set": {
      if (Object.is(action.value, state.present)) return state;
      const past = [...state.past, state.present];
      const overflow = past.length - normalizeMaxHistory(maxHistory);
      return {
        past: overflow > 0 ? past.slice(overflow) : past,
        present: action.value,
        future: [],
      };
    }
    case "undo": {
      const previous = entryAt(state.past, state.past.length - 1);
      if (previous === undefined) return state;
      return {
        past: state.past.slice(0, -1),
        present: previous.value,
        future: [state.present, ...state.future],
      };
    }
    case "redo": {
      const next = entryAt(state.future, 0);
      if (next === undefined) return state;
      return {
        past: [...state.past, state.present],
        present: next.value,
        future: state.future.slice(1),
      };
    }
    case "reset":
      return { past: [], present: action.value, future: [] };
  }
}

/**
 * Undo/redo manager over a single value.
 */
export function useHistory<T>(
  ctx: HistoryHookContext,
  initial: T,
  maxHistory: number = DEFAULT_MAX_HISTORY,
): UseHistoryResult<T> {
  const [state, dispatch] = ctx.useReducer<HistoryState<T>, HistoryAction<T>>(
    (s: HistoryState<T>, a: HistoryAction<T>) => reduceHistory(s, a, maxHistory),
    () => ({ past: [], present: initial, future: [] }),
  );

  const actions = ctx.useMemo(
    () => ({
      set: (value: T) => dispatch({ kind: "set", value }),
      undo: () => dispatch({ kind: "undo" }),
      redo: () => dispatch({ kind: "redo" }),
      reset: (value: T) => dispatch({ kind: "reset", value }),
    }),
    [dispatch],
  );

  return {
    value: state.present,
    past: state.past,
    future: state.future,
    canUndo: state.past.length > 0,
    canRedo: state.future.length > 0,
    ...actions,
  };
}

// =============================================================================
// Queries
// =============================================================================

type QueryHookContext = Pick<HookContext, "useReducer" | "useMemo" | "useEffect" | "useAsyncEffect">;

export type QueryStatus = "idle" | "loading" | "refreshing" | "success" | "error";

export type QueryOptions = Readonly<{
  /** When false the query never fetches and stays idle. Default true. */
  enabled?: boolean;
  /** How long (ms) cached data counts as fresh. Default 0. */
  staleTime?: number;
  /** How long (ms) an entry stays in the cache after it was written. Default 5 minutes. */
  cacheTime?: number;
  /** Default true. */
  retry?: boolean;
  /** Total attempts when `retry` is on. Default 3. */
  retryAttempts?: number;
  /** Base backoff (ms); attempt n waits `retryDelay * 2^(n-1)`. Default 1000. */
  retryDelay?: number;
  /** Refetch every this many ms while mounted; 0 disables. Default 0. */
  refetchInterval?: number;
}>;

export type QueryState<T> = Readonly<{
  status: QueryStatus;
  /** Kept through loading, refreshing and errors. */
  data: T | undefined;
  error: unknown;
  isStale: boolean;
  /** Bumped by `refetch`; part of the fetch effect's deps. */
  revision: number;
}>;

export type QueryAction<T> =
  | Readonly<{ kind: "loading" }>
  | Readonly<{ kind: "refreshing" }>
  | Readonly<{ kind: "success"; data: T }>
  | Readonly<{ kind: "error"; error: unknown }>
  | Readonly<{ kind: "refetch" }>
  | Readonly<{ kind: "invalidate" }>;

export type UseQueryResult<T> = Readonly<{
  status: QueryStatus;
  data: T | undefined;
  error: unknown;
  isIdle: boolean;
  isLoading: boolean;
  isRefreshing: boolean;
  isSuccess: boolean;
  isError: boolean;
  isStale: boolean;
  /** Fetch again, ignoring freshness. */
  refetch: () => void;
  /** Drop the cached entry and mark the data stale. Does not fetch. */
  invalidate: () => void;
}>;

export type QueryCacheStats = Readonly<{ size: number; keys: readonly string[] }>;

type CacheEntry = { data: unknown; lastUpdated: number; isStale: boolean };

const QUERY_DEFAULTS = Object.freeze({
  enabled: true,
  staleTime: 0,
  cacheTime: 5 * 60_000,
  retry: true,
  retryAttempts: 3,
  retryDelay: 1000,
  refetchInterval: 0,
});

const MAX_BACKOFF_EXPONENT = 10;

const queryCache = new Map<string, CacheEntry>();

/** Unexpired entry for `key`; expired entries are dropped on read. */
function readCache(key: string, cacheTime: number, now: number): CacheEntry | undefined {
  const entry = queryCache.get(key);
  if (entry === undefined) return undefined;
  if (now - entry.lastUpdated > cacheTime) {
    queryCache.delete(key);
    return undefined;
  }
  return entry;
}

function isFresh(entry: CacheEntry, staleTime: number, now: number): boolean {
  return !entry.isStale && now - entry.lastUpdated < staleTime;
}

/** Forget every cached query result. */
export function clearQueryCache(): void {
  queryCache.clear();
}

export function getCacheStats(): QueryCacheStats {
  return Object.freeze({ size: queryCache.size, keys: Object.freeze(Array.from(queryCache.keys())) });
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function delay(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer: ReturnType<typeof setTimeout> = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/** Wait before attempt `attempt + 1` of a query. */
export function queryBackoff(retryDelay: number, attempt: number): number {
  return retryDelay * 2 ** Math.min(attempt - 1, MAX_BACKOFF_EXPONENT);
}

async function fetchWithRetry<T>(
  fetcher: (signal: AbortSignal) => Promise<T>,
  signal: AbortSignal,
  retry: boolean,
  retryAttempts: number,
  retryDelay: number,
): Promise<T> {
  const maxAttempts = retry ? Math.max(1, retryAttempts) : 1;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fetcher(signal);
    } catch (error: unknown) {
      if (attempt >= maxAttempts) throw error;
      if (!(await delay(queryBackoff(retryDelay, attempt), signal))) throw error;
    }
  }
}

/** Pure query transition. */
export function reduceQuery<T>(state: QueryState<T>, action: QueryAction<T>): QueryState<T> {
  switch (action.kind) {
    case "loading":
      return { ...state, status: "loading", error: undefined, isStale: false };
    case "refreshing":
      return { ...state, status: "refreshing", error: undefined, isStale: true };
    case "success":
      return { ...state, status: "success", data: action.data, error: undefined, isStale: false };
    case "error":
      return { ...state, status: "error", error: action.error };
    case "refetch":
      return { ...state, revision: state.revision + 1 };
    case "invalidate":
      return state.isStale ? state : { ...state, isStale: true };
  }
}

/**
 * Fetch data for `key` and share it through a process-wide cache.
 *
 * A fresh cache entry is used without fetching. A stale one is shown at once
 * and refreshed in the background. Failed fetches are retried with
 * exponential backoff; a fetch superseded by a key change, a refetch or
 * unmount is aborted through its signal.
 */
export function useQuery<T>(
  ctx: QueryHookContext,
  key: string,
  fetcher: (signal: AbortSignal) => Promise<T>,
  options: QueryOptions = {},
): UseQueryResult<T> {
  const { enabled, staleTime, cacheTime, retry, retryAttempts, retryDelay, refetchInterval } = {
    ...QUERY_DEFAULTS,
    ...options,
  };

  const [state, dispatch] = ctx.useReducer<QueryState<T>, QueryAction<T>>(reduceQuery, () => {
    const now = Date.now();
    const cached = readCache(key, cacheTime, now);
    return {
      status: cached !== undefined && isFresh(cached, staleTime, now) ? "success" : "idle",
      // Entries are written only by a fetch for the same key.
      data: cached === undefined ? undefined : (cached.data as T),
      error: undefined,
      isStale: cached !== undefined && !isFresh(cached, staleTime, now),
      revision: 0,
    };
  });

  const hasData = state.data !== undefined;

  ctx.useAsyncEffect(
    async (signal): Promise<Readonly<{ data: T }> | null> => {
      if (!enabled) return null;
      const now = Date.now();
      const cached = readCache(key, cacheTime, now);
      if (cached !== undefined && isFresh(cached, staleTime, now)) {
        return { data: cached.data as T };
      }
      dispatch({ kind: hasData || cached !== undefined ? "refreshing" : "loading" });
      const data = await fetchWithRetry(fetcher, signal, retry, retryAttempts, retryDelay);
      queryCache.set(key, { data, lastUpdated: Date.now(), isStale: false });
      return { data };
    },
    [key, enabled, state.revision],
    (result) => {
      if (!result.ok) {
        dispatch({ kind: "error", error: result.error });
      } else if (result.value !== null) {
        dispatch({ kind: "success", data: result.value.data });
      }
    },
  );

  const actions = ctx.useMemo(
    () => ({
      refetch: () => {
        const entry = queryCache.get(key);
        if (entry !== undefined) entry.isStale = true;
        dispatch({ kind: "refetch" });
      },
      invalidate: () => {
        queryCache.delete(key);
        dispatch({ kind: "invalidate" });
      },
    }),
    [key, dispatch],
  );

  ctx.useEffect(() => {
    if (!enabled || !Number.isFinite(refetchInterval) || refetchInterval <= 0) return;
    const id: ReturnType<typeof setInterval> = setInterval(actions.refetch, refetchInterval);
    return () => {
      clearInterval(id);
    };
  }, [enabled, refetchInterval, actions]);

  return {
    status: state.status,
    data: state.data,
    error: state.error,
    isIdle: state.status === "idle",
    isLoading: state.status === "loading",
    isRefreshing: state.status === "refreshing",
    isSuccess: state.status === "success",
    isError: state.status === "error",
    isStale: state.isStale,
    ...actions,
  };
}

// =============================================================================
// Mutations
// =============================================================================

type MutationHookContext = Pick<HookContext, "useReducer" | "useRef" | "useMemo" | "useEffect">;

export type MutationStatus = "idle" | "pending" | "success" | "error" | "cancelled";

export const MUTATION_CANCELLED_REASON = "Mutation cancelled by user";

export type MutationOptions<TData, TVariables, TContext> = Readonly<{
  /** Runs before the mutation; its result is handed to the other callbacks. */
  onMutate?: (variables: TVariables) => TContext;
  onSuccess?: (data: TData, variables: TVariables, context: TContext | undefined) => void;
  onError?: (error: unknown, variables: TVariables, context: TContext | undefined) => void;
  onSettled?: (
    data: TData | undefined,
    error: unknown,
    variables: TVariables,
    context: TContext | undefined,
  ) => void;
  /** Default false. */
  retry?: boolean;
  /** Retries after the first attempt when `retry` is on. Default 0. */
  retryAttempts?: number;
  /** Default 1000 ms. */
  retryDelay?: number;
  /** Double the delay after every failed attempt. Default false. */
  retryExponentialBackoff?: boolean;
  /** Cap for the exponential delay. Default 30 s. */
  retryMaxDelay?: number;
}>;

export type MutationState<TData, TVariables, TContext> = Readonly<{
  status: MutationStatus;
  data: TData | undefined;
  error: unknown;
  variables: TVariables | undefined;
  context: TContext | undefined;
  submittedAt: number | null;
  failedCount: number;
  failureReason: string | null;
}>;

type MutationAction<TData, TVariables, TContext> =
  | Readonly<{
      kind: "pending";
      variables: TVariables;
      context: TContext | undefined;
      submittedAt: number;
    }>
  | Readonly<{ kind: "success"; data: TData }>
  | Readonly<{ kind: "error"; error: unknown; failedCount: number; failureReason: string }>
  | Readonly<{ kind: "cancelled" }>
  | Readonly<{ kind: "reset" }>;

export type UseMutationResult<TData, TVariables, TContext> = MutationState<
  TData,
  TVariables,
  TContext
> &
  Readonly<{
    isIdle: boolean;
    isPending: boolean;
    isSuccess: boolean;
    isError: boolean;
    isCancelled: boolean;
    /** Start the mutation; the outcome lands in state. */
    mutate: (variables: TVariables) => void;
    /** Start the mutation and settle with its data or error. */
    mutateAsync: (variables: TVariables) => Promise<TData>;
    /** Abort a running mutation and report it as cancelled. */
    cancel: () => void;
    /** Abort a running mutation and return to idle. */
    reset: () => void;
  }>;

const IDLE_MUTATION: MutationState<never, never, never> = Object.freeze({
  status: "idle",
  data: undefined,
  error: undefined,
  variables: undefined,
  context: undefined,
  submittedAt: null,
  failedCount: 0,
  failureReason: null,
});

function reduceMutation<TData, TVariables, TContext>(
  state: MutationState<TData, TVariables, TContext>,
  action: MutationAction<TData, TVariables, TContext>,
): MutationState<TData, TVariables, TContext> {
  switch (action.kind) {
    case "pending":
      return {
        ...IDLE_MUTATION,
        status: "pending",
        variables: action.variables,
        context: action.context,
        submittedAt: action.submittedAt,
      };
    case "success":
      return {
        ...state,
        status: "success",
        data: action.data,
        error: undefined,
        failedCount: 0,
        failureReason: null,
      };
    case "error":
      return {
        ...state,
        status: "error",
        data: undefined,
        error: action.error,
        failedCount: action.failedCount,
        failureReason: action.failureReason,
      };
    case "cancelled":
      return { ...state, status: "cancelled", failureReason: MUTATION_CANCELLED_REASON };
    case "reset":
      return IDLE_MUTATION;
  }
}

/** Wait before retry `attempt` of a mutation. */
export function mutationBackoff(
  retryDelay: number,
  attempt: number,
  exponential: boolean,
  maxDelay: number,
): number {
  if (!exponential) return retryDelay;
  return Math.min(retryDelay * 2 ** (attempt - 1), maxDelay);
}

type MutationOutcome<TData> =
  | Readonly<{ ok: true; value: TData }>
  | Readonly<{ ok: false; error: unknown }>;

/**
 * Run a side-effecting async operation on demand and track its progress.
 *
 * Starting a new mutation aborts the one in flight. The callbacks and the
 * mutation function are read from the latest render.
 */
export function useMutation<TData, TVariables = void, TContext = undefined>(
  ctx: MutationHookContext,
  mutationFn: (variables: TVariables, signal: AbortSignal) => Promise<TData>,
  options: MutationOptions<TData, TVariables, TContext> = {},
): UseMutationResult<TData, TVariables, TContext> {
  const [state, dispatch] = ctx.useReducer<
    MutationState<TData, TVariables, TContext>,
    MutationAction<TData, TVariables, TContext>
  >(reduceMutation, IDLE_MUTATION);

  const fnRef = ctx.useRef(mutationFn);
  fnRef.current = mutationFn;
  const optionsRef = ctx.useRef(options);
  optionsRef.current = options;
  const runRef = ctx.useRef<AbortController | null>(null);

  ctx.useEffect(
    () => () => {
      runRef.current?.abort();
      runRef.current = null;
    },
    [],
  );

  const actions = ctx.useMemo(() => {
    async function execute(variables: TVariables): Promise<MutationOutcome<TData>> {
      runRef.current?.abort();
      const controller = new AbortController();
      runRef.current = controller;
      const cancelled = (): MutationOutcome<TData> => ({
        ok: false,
        error: new Error(MUTATION_CANCELLED_REASON),
      });

      const opts = optionsRef.current;
      const retryAttempts = opts.retry === true ? Math.max(0, opts.retryAttempts ?? 0) : 0;
      const retryDelay = opts.retryDelay ?? 1000;
      const context = opts.onMutate?.(variables);
      dispatch({ kind: "pending", variables, context, submittedAt: Date.now() });

      for (let attempt = 1; ; attempt++) {
        let data: TData;
        try {
          data = await fnRef.current(variables, controller.signal);
        } catch (error: unknown) {
          if (controller.signal.aborted) return cancelled();
          if (attempt <= retryAttempts) {
            const wait = mutationBackoff(
              retryDelay,
              attempt,
              opts.retryExponentialBackoff === true,
              opts.retryMaxDelay ?? 30_000,
            );
            if (await delay(wait, controller.signal)) continue;
            return cancelled();
          }
          if (runRef.current === controller) runRef.current = null;
          dispatch({
            kind: "error",
            error,
            failedCount: attempt,
            failureReason: `Failed after ${String(attempt)} attempts`,
          });
          opts.onError?.(error, variables, context);
          opts.onSettled?.(undefined, error, variables, context);
          return { ok: false, error };
        }
        if (controller.signal.aborted) return cancelled();
        if (runRef.current === controller) runRef.current = null;
        dispatch({ kind: "success", data });
        opts.onSuccess?.(data, variables, context);
        opts.onSettled?.(data, undefined, variables, context);
        return { ok: true, value: data };
      }
    }

    return {
      mutate: (variables: TVariables): void => {
        execute(variables).catch((error: unknown) => {
          dispatch({
            kind: "error",
            error,
            failedCount: 0,
            failureReason: `Mutation callback threw: ${describeThrown(error)}`,
          });
        });
      },
      mutateAsync: async (variables: TVariables): Promise<TData> => {
        const outcome = await execute(variables);
        if (!outcome.ok) throw outcome.error;
        return outcome.value;
      },
      cancel: (): void => {
        const running = runRef.current;
        if (running === null) return;
        runRef.current = null;
        running.abort();
        dispatch({ kind: "cancelled" });
      },
      reset: (): void => {
        runRef.current?.abort();
        runRef.current = null;
        dispatch({ kind: "reset" });
      },
    };
  }, [dispatch]);

  return {
    ...state,
    isIdle: state.status === "idle",
    isPending: state.status === "pending",
    isSuccess: state.status === "success",
    isError: state.status === "error",
    isCancelled: state.status === "cancelled",
    ...actions,
  };
}
