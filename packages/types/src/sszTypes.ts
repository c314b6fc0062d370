import {ssz as phase0} from "./phase0/index.js";

export * from "./primitive/sszTypes.js";
export {phase0};
