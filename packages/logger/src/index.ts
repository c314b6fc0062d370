export * from "./interface.js";
export {createWinstonLogger, WinstonLogger} from "./winston.js";
export {getEmptyLogger} from "./empty.js";
export {getEnvLogger, getEnvLogLevel, getEnvLogFormat} from "./env.js";
