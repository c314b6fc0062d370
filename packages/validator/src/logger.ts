import {defaultLogLevel, getEnvLogFormat, getEnvLogLevel, getEnvLogger} from "@warden/logger";
import {getNodeLogger} from "@warden/logger/node";
import {Logger} from "@warden/utils";
import {ValidatorOptions} from "./options.js";

/**
 * Logger used when the host provides none. Level and format come from LOG_LEVEL and LOG_FORMAT,
 * with `logFile` set logs also go to a file rotated daily
 */
export function getValidatorLogger(opts: Pick<ValidatorOptions, "logFile" | "logFileDailyRotate">): Logger {
  if (opts.logFile === null) {
    return getEnvLogger({module: "validator"});
  }

  const level = getEnvLogLevel() ?? defaultLogLevel;
  return getNodeLogger({
    level,
    module: "validator",
    format: getEnvLogFormat(),
    file: {filepath: opts.logFile, level, dailyRotate: opts.logFileDailyRotate},
  });
}
