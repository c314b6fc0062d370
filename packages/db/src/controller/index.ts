export type {Db, DatabaseController, DatabaseOptions, DbReqOpts} from "./interface.js";
export {LevelDbController} from "./level.js";
export type {LevelDbControllerModules} from "./level.js";
export type {LevelDbControllerMetrics} from "./metrics.js";
