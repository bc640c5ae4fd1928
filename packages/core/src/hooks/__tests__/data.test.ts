import { assert, describe, flushAsync, test } from "@weft-tui/testkit";
import { settle, startApp } from "../../app/__tests__/helpers.js";
import { createHookHarness } from "../../runtime/__tests__/helpers.js";
import type { HookContext, StateSetter } from "../../runtime/instances.js";
import { type Component, element } from "../../vnode.js";
import {
  type HistoryState,
  MUTATION_CANCELLED_REASON,
  type QueryOptions,
  type QueryState,
  type UseQueryResult,
  clearQueryCache,
  getCacheStats,
  mutationBackoff,
  queryBackoff,
  reduceHistory,
  reduceQuery,
  useAsync,
  useHistory,
  useMutation,
  useQuery,
} from "../data.js";

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

function history(past: number[], present: number, future: number[]): HistoryState<number> {
  return { past, present, future };
}

describe("reduceHistory", () => {
  test("set pushes the present onto past and clears future", () => {
    assert.deepEqual(
      reduceHistory(history([1], 2, [3]), { kind: "set", value: 9 }, 100),
      history([1, 2], 9, []),
    );
  });

  test("setting the present value again is a no-op", () => {
    const state = history([1], 2, [3]);
    assert.equal(reduceHistory(state, { kind: "set", value: 2 }, 100), state);
  });

  test("past is trimmed from the oldest end", () => {
    assert.deepEqual(
      reduceHistory(history([1, 2, 3], 4, []), { kind: "set", value: 5 }, 3),
      history([2, 3, 4], 5, []),
    );
  });

  test("a fractional or tiny limit is normalized", () => {
    assert.deepEqual(
      reduceHistory(history([1, 2], 3, []), { kind: "set", value: 4 }, 0.5),
      history([3], 4, []),
    );
    assert.deepEqual(
      reduceHistory(history([1, 2], 3, []), { kind: "set", value: 4 }, 2.9),
      history([2, 3], 4, []),
    );
  });

  test("undo and redo move one step at a time", () => {
    const undone = reduceHistory(history([1, 2], 3, []), { kind: "undo" }, 100);
    assert.deepEqual(undone, history([1], 2, [3]));
    assert.deepEqual(reduceHistory(undone, { kind: "redo" }, 100), history([1, 2], 3, []));
  });

  test("undo with no past and redo with no future return the same state", () => {
    const state = history([], 1, []);
    assert.equal(reduceHistory(state, { kind: "undo" }, 100), state);
    assert.equal(reduceHistory(state, { kind: "redo" }, 100), state);
  });

  test("undefined entries survive undo", () => {
    const state: HistoryState<number | undefined> = { past: [undefined], present: 1, future: [] };
    assert.deepEqual(reduceHistory(state, { kind: "undo" }, 100), {
      past: [],
      present: undefined,
      future: [1],
    });
  });

  test("reset forgets everything", () => {
    assert.deepEqual(
      reduceHistory(history([1], 2, [3]), { kind: "reset", value: 0 }, 100),
      history([], 0, []),
    );
  });
});

describe("useHistory", () => {
  test("actions are stable and dispatch through the reducer", () => {
    const h = createHookHarness();
    const first = h.render((hooks) => useHistory(hooks, "a"));
    assert.equal(first.value, "a");
    assert.equal(first.canUndo, false);

    first.set("b");
    first.set("c");
    first.undo();
    h.deliverUpdates();
    const second = h.render((hooks) => useHistory(hooks, "a"));

    assert.equal(second.value, "b");
    assert.deepEqual(second.past, ["a"]);
    assert.deepEqual(second.future, ["c"]);
    assert.equal(second.canUndo, true);
    assert.equal(second.canRedo, true);
    assert.equal(second.set, first.set);
  });
});

describe("useAsync", () => {
  test("tracks a run from pending to success and keeps the value while re-running", async () => {
    const resolvers = new Map<number, (value: string) => void>();
    let setId: StateSetter<number> = () => {};
    const User: Component = (_props, ctx) => {
      const [id, set] = ctx.useState(1);
      setId = set;
      const state = useAsync(
        ctx,
        () =>
          new Promise<string>((resolve) => {
            resolvers.set(id, resolve);
          }),
        [id],
      );
      return element("label", { status: state.status, value: state.value ?? null });
    };
    const { app, backend } = await startApp(element(User, {}));
    assert.deepEqual(backend.lines(), ["User#1", '  label#2 {status="pending" value=null}']);

    resolvers.get(1)?.("ada");
    await settle(app);
    assert.deepEqual(backend.lines(), ["User#1", '  label#2 {status="success" value="ada"}']);

    setId(2);
    await settle(app);
    assert.deepEqual(backend.lines(), ["User#1", '  label#2 {status="pending" value="ada"}']);

    resolvers.get(2)?.("grace");
    await settle(app);
    assert.deepEqual(backend.lines(), ["User#1", '  label#2 {status="success" value="grace"}']);
    await app.stop();
  });

  test("a rejected run reports the error", async () => {
    const Failing: Component = (_props, ctx) => {
      const state = useAsync(ctx, () => Promise.reject(new Error("offline")), []);
      const message = state.error instanceof Error ? state.error.message : "";
      return element("label", { status: state.status, message });
    };
    const { app, backend } = await startApp(element(Failing, {}));
    assert.deepEqual(backend.lines(), ["Failing#1", '  label#2 {message="offline" status="error"}']);
    await app.stop();
  });
});

function query(status: QueryState<string>["status"], data: string | undefined): QueryState<string> {
  return { status, data, error: undefined, isStale: false, revision: 0 };
}

describe("reduceQuery", () => {
  test("refreshing keeps the data and marks it stale", () => {
    assert.deepEqual(reduceQuery(query("success", "ada"), { kind: "refreshing" }), {
      status: "refreshing",
      data: "ada",
      error: undefined,
      isStale: true,
      revision: 0,
    });
  });

  test("an error keeps the last data", () => {
    const failed = reduceQuery(query("refreshing", "ada"), { kind: "error", error: "offline" });
    assert.equal(failed.status, "error");
    assert.equal(failed.data, "ada");
    assert.equal(failed.error, "offline");
  });

  test("refetch only bumps the revision", () => {
    const next = reduceQuery(query("success", "ada"), { kind: "refetch" });
    assert.deepEqual(next, { ...query("success", "ada"), revision: 1 });
  });
});

describe("backoff", () => {
  test("query delays double per attempt and stop growing after ten doublings", () => {
    assert.equal(queryBackoff(1000, 1), 1000);
    assert.equal(queryBackoff(1000, 3), 4000);
    assert.equal(queryBackoff(1, 11), 1024);
    assert.equal(queryBackoff(1, 40), 1024);
  });

  test("mutation delays are fixed unless exponential, and capped", () => {
    assert.equal(mutationBackoff(1000, 5, false, 30_000), 1000);
    assert.equal(mutationBackoff(1000, 1, true, 30_000), 1000);
    assert.equal(mutationBackoff(1000, 3, true, 30_000), 4000);
    assert.equal(mutationBackoff(1000, 10, true, 30_000), 30_000);
  });
});

type Deferred = Readonly<{ resolve: (value: string) => void; reject: (error: Error) => void }>;

function queryView(options?: QueryOptions): Readonly<{
  Profile: Component;
  calls: Deferred[];
  latest: () => UseQueryResult<string> | undefined;
}> {
  const calls: Deferred[] = [];
  let latest: UseQueryResult<string> | undefined;
  const Profile: Component = (_props, ctx) => {
    const q = useQuery(
      ctx,
      "user",
      () =>
        new Promise<string>((resolve, reject) => {
          calls.push({ resolve, reject });
        }),
      options,
    );
    latest = q;
    return element("label", { status: q.status, data: q.data ?? null, stale: q.isStale });
  };
  return { Profile, calls, latest: () => latest };
}

describe("useQuery", () => {
  test("fetches, caches, and serves fresh entries without fetching", async () => {
    clearQueryCache();
    const first = queryView();
    const a = await startApp(element(first.Profile, {}));
    assert.deepEqual(a.backend.lines(), [
      "Profile#1",
      '  label#2 {data=null stale=false status="loading"}',
    ]);

    first.calls[0]?.resolve("ada");
    await settle(a.app);
    assert.deepEqual(a.backend.lines(), [
      "Profile#1",
      '  label#2 {data="ada" stale=false status="success"}',
    ]);
    assert.deepEqual(getCacheStats(), { size: 1, keys: ["user"] });
    await a.app.stop();

    const fresh = queryView({ staleTime: 60_000 });
    const b = await startApp(element(fresh.Profile, {}));
    assert.deepEqual(b.backend.lines(), [
      "Profile#1",
      '  label#2 {data="ada" stale=false status="success"}',
    ]);
    assert.equal(fresh.calls.length, 0);
    await b.app.stop();
  });

  test("a stale entry is shown while it refreshes", async () => {
    clearQueryCache();
    const first = queryView();
    const a = await startApp(element(first.Profile, {}));
    first.calls[0]?.resolve("ada");
    await settle(a.app);
    await a.app.stop();

    const second = queryView();
    const b = await startApp(element(second.Profile, {}));
    assert.deepEqual(b.backend.lines(), [
      "Profile#1",
      '  label#2 {data="ada" stale=true status="refreshing"}',
    ]);
    second.calls[0]?.resolve("grace");
    await settle(b.app);
    assert.deepEqual(b.backend.lines(), [
      "Profile#1",
      '  label#2 {data="grace" stale=false status="success"}',
    ]);
    await b.app.stop();
  });

  test("refetch fetches again even while fresh; invalidate drops the entry", async () => {
    clearQueryCache();
    const view = queryView({ staleTime: 60_000 });
    const { app, backend } = await startApp(element(view.Profile, {}));
    view.calls[0]?.resolve("ada");
    await settle(app);

    view.latest()?.refetch();
    await settle(app);
    assert.equal(view.calls.length, 2);
    assert.deepEqual(backend.lines(), [
      "Profile#1",
      '  label#2 {data="ada" stale=true status="refreshing"}',
    ]);
    view.calls[1]?.resolve("grace");
    await settle(app);
    assert.deepEqual(backend.lines(), [
      "Profile#1",
      '  label#2 {data="grace" stale=false status="success"}',
    ]);

    view.latest()?.invalidate();
    await settle(app);
    assert.deepEqual(getCacheStats(), { size: 0, keys: [] });
    assert.deepEqual(backend.lines(), [
      "Profile#1",
      '  label#2 {data="grace" stale=true status="success"}',
    ]);
    assert.equal(view.calls.length, 2);
    await app.stop();
  });

  test("failed fetches are retried with backoff until the attempts run out", async () => {
    clearQueryCache();
    let attempts = 0;
    const Flaky: Component = (_props, ctx) => {
      const q = useQuery(
        ctx,
        "flaky",
        () => {
          attempts++;
          return attempts < 3 ? Promise.reject(new Error("flaky")) : Promise.resolve("ok");
        },
        { retryDelay: 1 },
      );
      return element("label", { status: q.status, data: q.data ?? null });
    };
    const { app, backend } = await startApp(element(Flaky, {}));
    await sleep(30);
    await settle(app);
    assert.equal(attempts, 3);
    assert.deepEqual(backend.lines(), ["Flaky#1", '  label#2 {data="ok" status="success"}']);
    await app.stop();
  });

  test("the last error is reported once retries are exhausted", async () => {
    clearQueryCache();
    let attempts = 0;
    const Down: Component = (_props, ctx) => {
      const q = useQuery(
        ctx,
        "down",
        () => {
          attempts++;
          return Promise.reject(new Error(`down ${String(attempts)}`));
        },
        { retryAttempts: 2, retryDelay: 1 },
      );
      const message = q.error instanceof Error ? q.error.message : "";
      return element("label", { status: q.status, message });
    };
    const { app, backend } = await startApp(element(Down, {}));
    await sleep(30);
    await settle(app);
    assert.equal(attempts, 2);
    assert.deepEqual(backend.lines(), ["Down#1", '  label#2 {message="down 2" status="error"}']);
    assert.deepEqual(getCacheStats(), { size: 0, keys: [] });
    await app.stop();
  });

  test("a disabled query stays idle and never fetches", async () => {
    clearQueryCache();
    const view = queryView({ enabled: false });
    const { app, backend } = await startApp(element(view.Profile, {}));
    assert.equal(view.calls.length, 0);
    assert.deepEqual(backend.lines(), [
      "Profile#1",
      '  label#2 {data=null stale=false status="idle"}',
    ]);
    await app.stop();
  });
});

describe("useMutation", () => {
  test("runs the callbacks in order and records the result", async () => {
    const h = createHookHarness();
    const log: string[] = [];
    const use = (hooks: HookContext) =>
      useMutation(hooks, (name: string) => Promise.resolve(`saved ${name}`), {
        onMutate: (name) => {
          log.push(`mutate ${name}`);
          return "ctx-1";
        },
        onSuccess: (data, name, context) => {
          log.push(`success ${data} ${name} ${String(context)}`);
        },
        onError: () => {
          log.push("error");
        },
        onSettled: (data, error, _name, context) => {
          log.push(`settled ${String(data)} ${String(error)} ${String(context)}`);
        },
      });

    const first = h.render(use);
    assert.equal(first.status, "idle");
    assert.equal(await first.mutateAsync("ada"), "saved ada");
    h.deliverUpdates();
    const second = h.render(use);

    assert.equal(second.status, "success");
    assert.equal(second.isSuccess, true);
    assert.equal(second.data, "saved ada");
    assert.equal(second.variables, "ada");
    assert.equal(second.context, "ctx-1");
    assert.equal(second.failedCount, 0);
    assert.equal(typeof second.submittedAt, "number");
    assert.equal(second.mutate, first.mutate);
    assert.deepEqual(log, [
      "mutate ada",
      "success saved ada ada ctx-1",
      "settled saved ada undefined ctx-1",
    ]);
  });

  test("retries with exponential backoff before succeeding", async () => {
    const h = createHookHarness();
    let calls = 0;
    const result = h.render((hooks) =>
      useMutation(
        hooks,
        () => {
          calls++;
          return calls < 3 ? Promise.reject(new Error("busy")) : Promise.resolve(calls);
        },
        { retry: true, retryAttempts: 2, retryDelay: 1, retryExponentialBackoff: true },
      ),
    );
    assert.equal(await result.mutateAsync(), 3);
    assert.equal(calls, 3);
  });

  test("mutate reports the final failure through state and onError", async () => {
    const h = createHookHarness();
    const errors: string[] = [];
    const use = (hooks: HookContext) =>
      useMutation(hooks, (_id: number) => Promise.reject(new Error("nope")), {
        retry: true,
        retryAttempts: 1,
        retryDelay: 1,
        onError: (error, id) => {
          errors.push(`${error instanceof Error ? error.message : ""} ${String(id)}`);
        },
      });
    h.render(use).mutate(7);
    await sleep(20);
    h.deliverUpdates();
    const state = h.render(use);

    assert.equal(state.status, "error");
    assert.equal(state.isError, true);
    assert.equal(state.failedCount, 2);
    assert.equal(state.failureReason, "Failed after 2 attempts");
    assert.equal(state.data, undefined);
    assert.deepEqual(errors, ["nope 7"]);
  });

  test("cancel aborts the running mutation; reset returns to idle", async () => {
    const h = createHookHarness();
    let aborted = false;
    const use = (hooks: HookContext) =>
      useMutation(
        hooks,
        (_name: string, signal: AbortSignal) =>
          new Promise<string>((_resolve, reject) => {
            signal.addEventListener("abort", () => {
              aborted = true;
              reject(new Error("aborted"));
            });
          }),
      );

    const first = h.render(use);
    const running = first.mutateAsync("x");
    first.cancel();
    await assert.rejects(running, { message: MUTATION_CANCELLED_REASON });
    assert.equal(aborted, true);

    h.deliverUpdates();
    const cancelled = h.render(use);
    assert.equal(cancelled.status, "cancelled");
    assert.equal(cancelled.failureReason, MUTATION_CANCELLED_REASON);
    assert.equal(cancelled.variables, "x");

    cancelled.reset();
    h.deliverUpdates();
    const idle = h.render(use);
    assert.equal(idle.status, "idle");
    assert.equal(idle.variables, undefined);
    assert.equal(idle.failureReason, null);
  });

  test("a throwing callback leaves the mutation in the error state", async () => {
    const h = createHookHarness();
    const use = (hooks: HookContext) =>
      useMutation(hooks, () => Promise.resolve(1), {
        onSuccess: () => {
          throw new Error("handler broke");
        },
      });
    h.render(use).mutate();
    await flushAsync();
    h.deliverUpdates();
    const state = h.render(use);
    assert.equal(state.status, "error");
    assert.equal(state.failureReason, "Mutation callback threw: Error: handler broke");
  });
});
