import { assert, describe, test } from "@weft-tui/testkit";
import { HookOrderError } from "../../errors.js";
import { createContext } from "../context.js";
import { createHookHarness } from "./helpers.js";

function catchHookOrder(run: () => void): HookOrderError {
  try {
    run();
  } catch (e: unknown) {
    if (e instanceof HookOrderError) return e;
    throw e;
  }
  assert.fail("expected a HookOrderError");
}

describe("runtime hooks - ordering", () => {
  test("a different hook kind at the same position is a HookOrderError", () => {
    const h = createHookHarness("Panel", 3);
    h.render((hooks) => {
      hooks.useState(0);
      hooks.useRef(null);
    });

    const err = catchHookOrder(() =>
      h.render((hooks) => {
        hooks.useRef(null);
        hooks.useState(0);
      }),
    );
    assert.equal(err.code, "WEFT_HOOK_ORDER");
    assert.equal(err.instanceId, 3);
    assert.equal(err.componentName, "Panel");
    assert.equal(err.slotIndex, 0);
    assert.equal(
      err.message,
      "Hook order violation in <Panel> (instance 3) at slot 0: called useRef where the previous render called useState",
    );
  });

  test("calling fewer hooks than the first render fails at endRender", () => {
    const h = createHookHarness("Panel", 1);
    h.render((hooks) => {
      hooks.useState(0);
      hooks.useState(1);
    });

    const err = catchHookOrder(() =>
      h.render((hooks) => {
        hooks.useState(0);
      }),
    );
    assert.equal(err.slotIndex, 1);
    assert.equal(
      err.message,
      "Hook order violation in <Panel> (instance 1) at slot 1: rendered 1 hooks, the previous render called 2",
    );
  });

  test("calling more hooks than the first render fails at the extra call", () => {
    const h = createHookHarness("Panel", 1);
    h.render((hooks) => {
      hooks.useState(0);
    });

    const err = catchHookOrder(() =>
      h.render((hooks) => {
        hooks.useState(0);
        hooks.useMemo(() => 1, []);
      }),
    );
    assert.equal(err.slotIndex, 1);
    assert.equal(
      err.message,
      "Hook order violation in <Panel> (instance 1) at slot 1: called useMemo after the 1 hooks of the previous render",
    );
  });

  test("reading a different context at the same position is a violation", () => {
    const Theme = createContext("dark", "Theme");
    const Locale = createContext("en", "Locale");
    const h = createHookHarness("Panel", 1);
    h.render((hooks) => hooks.useContext(Theme));

    const err = catchHookOrder(() => h.render((hooks) => hooks.useContext(Locale)));
    assert.equal(
      err.message,
      "Hook order violation in <Panel> (instance 1) at slot 0: useContext(Locale) read a different context than the previous render",
    );
  });

  test("a stable hook sequence never throws", () => {
    const h = createHookHarness();
    for (let i = 0; i < 5; i++) {
      h.render((hooks) => {
        hooks.useState(i);
        hooks.useReducer((s: number, a: number) => s + a, 0);
        hooks.useRef(i);
        hooks.useEffect(() => {}, [i]);
        hooks.useMemo(() => i, [i]);
        hooks.useCallback(() => i, [i]);
      });
    }
    assert.equal(h.arena.get(1)?.expectedHookCount, 6);
  });
});
