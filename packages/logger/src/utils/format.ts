import winston, {format} from "winston";
import {WardenError, isEmptyObject, logCtxToJson, logCtxToString, LogData} from "@warden/utils";
import {LoggerOptions, TimestampFormatCode} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;

type WinstonInfoArg = {
  level: string;
  message: string;
  module?: string;
  timestamp?: string;
  context?: LogData;
  error?: Error;
};

export function getFormat(opts: LoggerOptions): Format {
  switch (opts.format) {
    case "json":
      return jsonLogFormat(opts);

    case "human":
    default:
      return humanReadableLogFormat(opts);
  }
}

function isTimestampHidden(opts: LoggerOptions): boolean {
  return opts.timestampFormat?.format === TimestampFormatCode.Hidden;
}

function humanReadableLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(isTimestampHidden(opts) ? [] : [format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})]),
    format.colorize(),
    format.printf(humanReadableTemplateFn)
  );
}

function jsonLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(isTimestampHidden(opts) ? [] : [format.timestamp()]),
    format((info) => {
      info.context = logCtxToJson(info.context);
      info.error = logCtxToJson(info.error);
      return info;
    })(),
    format.json()
  );
}

/**
 * Winston template function print a human readable string given a log object
 */
function humanReadableTemplateFn(_info: winston.Logform.TransformableInfo): string {
  const info = _info as unknown as WinstonInfoArg;

  const paddingBetweenInfo = 30;

  const infoString = info.module || "";
  const infoPad = paddingBetweenInfo - infoString.length;

  let str = "";

  if (info.timestamp) str += info.timestamp;

  str += `[${infoString}] ${info.level.padStart(infoPad)}: ${info.message}`;

  const hasContext = info.context !== undefined && !isEmptyObject(info.context);
  if (hasContext) str += " " + logCtxToString(info.context);
  if (info.error !== undefined) {
    str +=
      // WardenError is formatted in the same way as context, it is either appended to
      // the log message (" ") or extends existing context properties (", "). For any other
      // error, the message is printed out and clearly separated from the log message (" - ").
      (info.error instanceof WardenError ? (hasContext ? ", " : " ") : " - ") +
      logCtxToString(info.error);
  }

  return str;
}
