import winston from "winston";
import {LogLevel} from "@warden/utils";
import {getEmptyLogger} from "./empty.js";
import {LogFormat, LoggerWithChild, TimestampFormatCode, logFormats} from "./interface.js";
import {createWinstonLogger} from "./winston.js";

export function getEnvLogLevel(): LogLevel | null {
  const level = process.env.LOG_LEVEL;
  if (level) return isLogLevel(level) ? level : null;
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

export function getEnvLogFormat(): LogFormat | undefined {
  const envFormat = process.env.LOG_FORMAT;
  return logFormats.find((f) => f === envFormat);
}

/**
 * Logger configured by environment, useful for tests and scripts:
 * `LOG_LEVEL`, `LOG_FORMAT` and `LOG_TIMESTAMP_FORMAT`. Without a level nothing is logged
 */
export function getEnvLogger(opts?: {module?: string}): LoggerWithChild {
  const level = getEnvLogLevel();
  if (level == null) {
    return getEmptyLogger();
  }

  const format = getEnvLogFormat();
  const timestampFormat =
    process.env.LOG_TIMESTAMP_FORMAT === TimestampFormatCode.Hidden
      ? {format: TimestampFormatCode.Hidden}
      : {format: TimestampFormatCode.DateRegular};

  return createWinstonLogger({level, module: opts?.module ?? "", format, timestampFormat}, [
    new winston.transports.Console({level}),
  ]);
}

function isLogLevel(level: string): level is LogLevel {
  return Object.values<string>(LogLevel).includes(level);
}
