import winston from "winston";
import type {Logger as Winston} from "winston";
import {LogData} from "@warden/utils";
import {LoggerOptions, LoggerChildOpts, LoggerWithChild, LogLevel, logLevelNum} from "./interface.js";
import {getFormat} from "./utils/format.js";

// # How to configure Winston log level?
//
// - Log level is meant to be configured BY TRANSPORT only
// - There's no native logic that allows different logLevels by metadata.module
// - Transports are shared between child loggers, so a custom transport is required
//
// To configure different logLevel per metadata.module the node logger uses ConsoleDynamicLevel,
// a console transport that overrides `transport._write` with a lookup on a Map of module -> log level.

interface DefaultMeta {
  module: string;
}

export function createWinstonLogger(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): WinstonLogger {
  return WinstonLogger.fromOpts(options, transports);
}

export class WinstonLogger implements LoggerWithChild {
  constructor(protected readonly winston: Winston) {}

  static fromOpts(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): WinstonLogger {
    return new WinstonLogger(WinstonLogger.createWinstonInstance(options, transports));
  }

  static createWinstonInstance(options: Partial<LoggerOptions>, transports?: winston.transport[]): Winston {
    const defaultMeta: DefaultMeta = {module: options.module || ""};

    return winston.createLogger({
      // Do not set level at the logger level. Always control by Transport, unless for testLogger
      level: options.level,
      defaultMeta,
      format: getFormat(options),
      transports,
      exitOnError: false,
      levels: logLevelNum,
    });
  }

  error(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.debug, message, context, error);
  }

  child(options: LoggerChildOpts): WinstonLogger {
    return new WinstonLogger(this.childWinston(options));
  }

  protected childWinston(options: LoggerChildOpts): Winston {
    const parentMeta = this.winston.defaultMeta as DefaultMeta | undefined;
    const childModule = [parentMeta?.module, options.module].filter(Boolean).join("/");
    const defaultMeta: DefaultMeta = {module: childModule};

    // Same strategy as Winston's source .child.
    // However, their implementation of child is to merge info objects where parent takes precedence, so it's
    // impossible for child to overwrite 'module' field. Instead the winston class is cloned as defaultMeta
    // overwritten completely.
    const childWinston = Object.create(this.winston) as Winston;

    childWinston.defaultMeta = defaultMeta;

    return childWinston;
  }

  private createLogEntry(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // Note: logger does not run format.transform function unless it will actually write the log to the transport

    // If winston logger is called with `winston.info(message, context, error)` it triggers the "splat" path
    // while we just need winston to forward an object to the custom formatter. So we call the fn signature below
    this.winston.log(level, {message, context, error});
  }
}
