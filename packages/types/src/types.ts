export * from "./primitive/types.js";
export {ts as phase0} from "./phase0/index.js";
