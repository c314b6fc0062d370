export * from "./types.js";
export * as ts from "./types.js";
export * as ssz from "./sszTypes.js";
