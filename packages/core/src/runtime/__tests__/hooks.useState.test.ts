import { assert, describe, test } from "@weft-tui/testkit";
import type { StateSetter } from "../instances.js";
import { createHookHarness } from "./helpers.js";

describe("runtime hooks - useState", () => {
  test("initializes from a literal value", () => {
    const h = createHookHarness();
    const [value] = h.render((hooks) => hooks.useState(42));
    assert.equal(value, 42);
  });

  test("calls a lazy initializer once", () => {
    const h = createHookHarness();
    let calls = 0;
    const init = () => {
      calls++;
      return "lazy";
    };
    h.render((hooks) => hooks.useState(init));
    const [value] = h.render((hooks) => hooks.useState(init));
    assert.equal(value, "lazy");
    assert.equal(calls, 1);
  });

  test("setters post instead of mutating; updates fold in order at the next render", () => {
    const h = createHookHarness();
    const [, setCount] = h.render((hooks) => hooks.useState(0));

    setCount((c) => c + 1);
    setCount((c) => c * 10);
    assert.equal(h.outbox.length, 2);
    assert.equal(h.arena.isDirty(1), false);

    assert.equal(h.deliverUpdates(), 2);
    assert.equal(h.arena.isDirty(1), true);

    const [value] = h.render((hooks) => hooks.useState(0));
    assert.equal(value, 10);
    assert.equal(h.arena.isDirty(1), false);
  });

  test("setting the current value with nothing queued posts nothing", () => {
    const h = createHookHarness();
    const [, setCount] = h.render((hooks) => hooks.useState(7));
    setCount(7);
    assert.equal(h.outbox.length, 0);
  });

  test("the equality shortcut is off while updates are in flight", () => {
    const h = createHookHarness();
    const [, setCount] = h.render((hooks) => hooks.useState(0));
    setCount(1);
    setCount(0);
    assert.equal(h.outbox.length, 2);
    h.deliverUpdates();
    const [value] = h.render((hooks) => hooks.useState(0));
    assert.equal(value, 0);
  });

  test("setter identity is stable across renders", () => {
    const h = createHookHarness();
    const [, first] = h.render((hooks) => hooks.useState("a"));
    first("b");
    h.deliverUpdates();
    const [value, second] = h.render((hooks) => hooks.useState("a"));
    assert.equal(value, "b");
    assert.equal(first, second);
  });

  test("a setter of an unmounted instance is a no-op", () => {
    const h = createHookHarness();
    let setValue: StateSetter<number> = () => {};
    h.render((hooks) => {
      const [, set] = hooks.useState(0);
      setValue = set;
    });
    assert.equal(h.unmount(), true);
    setValue(5);
    assert.equal(h.outbox.length, 0);
  });

  test("an update posted before unmount is dropped on delivery", () => {
    const h = createHookHarness();
    const [, setValue] = h.render((hooks) => hooks.useState(0));
    setValue(1);
    h.unmount();
    assert.equal(h.deliverUpdates(), 0);
    assert.deepEqual(h.arena.dirtyIds(), []);
  });

  test("posted messages address the instance, generation and slot", () => {
    const h = createHookHarness("Slots", 4);
    const [, , setSecond] = h.render((hooks) => {
      const [a] = hooks.useState("first");
      const [b, setB] = hooks.useState("second");
      return [a, b, setB] as const;
    });
    setSecond("changed");
    assert.deepEqual(h.outbox, [
      { kind: "hookUpdate", instanceId: 4, generation: 0, slotIndex: 1, update: "changed" },
    ]);
  });
});
