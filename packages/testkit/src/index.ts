export { createRng, type Rng } from "./rng.js";
export { flushMicrotasks, flushAsync } from "./flush.js";
export { assert, describe, test } from "./nodeTest.js";
