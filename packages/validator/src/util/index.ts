export * from "./epoch.js";
export * from "./mutex.js";
export * from "./registryMetricCreator.js";
