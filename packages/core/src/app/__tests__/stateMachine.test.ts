import { assert, describe, test } from "@weft-tui/testkit";
import { WeftError } from "../../errors.js";
import { AppStateMachine, canEnterPhase } from "../stateMachine.js";

describe("app state machine", () => {
  test("Created → Running → Stopped → Disposed", () => {
    const sm = new AppStateMachine();
    assert.equal(sm.state, "Created");
    sm.toRunning();
    assert.equal(sm.state, "Running");
    sm.toStopped();
    assert.equal(sm.state, "Stopped");
    sm.dispose();
    assert.equal(sm.state, "Disposed");
  });

  test("only a Running app can fault", () => {
    const sm = new AppStateMachine();
    assert.throws(
      () => sm.toFaulted(),
      (e: unknown) =>
        e instanceof WeftError &&
        e.code === "WEFT_INVALID_STATE" &&
        e.message === "toFaulted: must be Running (state=Created)",
    );
    sm.toRunning();
    sm.toFaulted();
    assert.equal(sm.state, "Faulted");
  });

  test("a stopped app cannot be started again", () => {
    const sm = new AppStateMachine();
    sm.toRunning();
    sm.toStopped();
    assert.throws(() => sm.toRunning(), { message: "toRunning: must be Created (state=Stopped)" });
  });

  test("loop phases follow render → commit → effects", () => {
    assert.equal(canEnterPhase("idle", "rendering"), true);
    assert.equal(canEnterPhase("rendering", "committing"), true);
    assert.equal(canEnterPhase("committing", "runningEffects"), true);
    assert.equal(canEnterPhase("runningEffects", "rendering"), true);
    assert.equal(canEnterPhase("idle", "committing"), false);
    assert.equal(canEnterPhase("rendering", "runningEffects"), false);
    assert.equal(canEnterPhase("committing", "rendering"), false);
    for (const from of ["idle", "rendering", "committing", "runningEffects"] as const) {
      assert.equal(canEnterPhase(from, "idle"), true);
    }
  });
});
