import { assert, describe, test } from "@weft-tui/testkit";
import { type VNode, element, text } from "../../vnode.js";
import { createInstanceIdAllocator } from "../instance.js";
import { reconcileChildren } from "../reconcile.js";

describe("reconcileChildren - unkeyed", () => {
  test("a first render allocates ids in order", () => {
    const res = reconcileChildren(
      0,
      [],
      [element("box"), text("hi"), element("row")],
      createInstanceIdAllocator(),
    );
    assert.ok(res.ok);
    if (!res.ok) return;

    assert.deepEqual(res.value.newInstanceIds, [1, 2, 3]);
    assert.deepEqual(
      res.value.nextChildren.map((c) => c.slotId),
      ["i:0", "i:1", "i:2"],
    );
  });

  test("same kind at the same index is reused; a different type is replaced", () => {
    const prev: { instanceId: number; vnode: VNode }[] = [
      { instanceId: 1, vnode: text("a") },
      { instanceId: 2, vnode: element("box") },
    ];
    const res = reconcileChildren(0, prev, [text("b"), element("row")], createInstanceIdAllocator(10));
    assert.ok(res.ok);
    if (!res.ok) return;

    const [first, second] = res.value.nextChildren;
    assert.equal(first?.kind, "reused");
    assert.equal(first?.instanceId, 1);
    assert.equal(second?.kind, "new");
    assert.equal(second?.instanceId, 10);
    assert.equal(second?.replacedInstanceId, 2);
    assert.deepEqual(res.value.unmountedInstanceIds, [2]);
  });

  test("a shrinking list unmounts the tail", () => {
    const prev = [1, 2, 3].map((instanceId) => ({ instanceId, vnode: element("box") }));
    const res = reconcileChildren(0, prev, [element("box")], createInstanceIdAllocator(10));
    assert.ok(res.ok);
    if (!res.ok) return;

    assert.deepEqual(res.value.reusedInstanceIds, [1]);
    assert.deepEqual(res.value.unmountedInstanceIds, [2, 3]);
  });

  test("a component type change at the same index is a replacement", () => {
    const A = () => null;
    const B = () => null;
    const prev = [{ instanceId: 1, vnode: element(A, {}) }];
    const res = reconcileChildren(0, prev, [element(B, {})], createInstanceIdAllocator(10));
    assert.ok(res.ok);
    if (!res.ok) return;

    assert.equal(res.value.nextChildren[0]?.replacedInstanceId, 1);
  });
});
