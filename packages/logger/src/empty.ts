import {LoggerWithChild} from "./interface.js";

export function getEmptyLogger(): LoggerWithChild {
  const logger: LoggerWithChild = {
    error: function error(): void {
      // Do nothing
    },
    warn: function warn(): void {
      // Do nothing
    },
    info: function info(): void {
      // Do nothing
    },
    verbose: function verbose(): void {
      // Do nothing
    },
    debug: function debug(): void {
      // Do nothing
    },
    child: () => logger,
  };
  return logger;
}
