export * from "./databaseService.js";
export * from "./abstractRepository.js";
export * from "./controller/index.js";
export * from "./const.js";
export {encodeKey} from "./util.js";
