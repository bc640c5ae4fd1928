import { assert, describe, test } from "@weft-tui/testkit";
import { createTestBackend } from "../../testing/testBackend.js";
import { type Component, element } from "../../vnode.js";
import { render } from "../render.js";

describe("render", () => {
  test("resolves once the app exits and tears the backend down", async () => {
    const OneShot: Component = (_props, ctx) => {
      ctx.useEffect(() => {
        ctx.requestExit();
      }, []);
      return element("label", { value: "bye" });
    };
    const backend = createTestBackend();
    await render(element(OneShot, {}), { backend });

    assert.deepEqual(backend.getCalls(), ["start", "draw", "stop", "dispose"]);
    assert.deepEqual(backend.lines(), ["OneShot#1", '  label#2 {value="bye"}']);
  });

  test("rejects with the fatal error", async () => {
    const Broken: Component = () => {
      throw new Error("nope");
    };
    const backend = createTestBackend();
    await assert.rejects(render(element(Broken, {}), { backend }), {
      code: "WEFT_USER_CODE_THROW",
      message: "<Broken> threw during render: Error: nope",
    });
    assert.deepEqual(backend.getCalls(), ["start", "stop", "dispose"]);
  });
});
