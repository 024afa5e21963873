export { createRng, type Rng } from "./rng.js";
export { assert, assertClose, describe, test, type AssertCloseOptions } from "./nodeTest.js";
