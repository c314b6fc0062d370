export * from "./types.js";
import * as ssz from "./sszTypes.js";
export {ssz};
