export * from "./bytes.js";
export * from "./errors.js";
export * from "./format.js";
export * from "./json.js";
export * from "./logger.js";
export * from "./metrics.js";
export * from "./objects.js";
