import path from "node:path";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
// We want to keep `winston` export as it's more readable and easier to understand
import winston from "winston";
import type {Logger as Winston} from "winston";
import {LoggerChildOpts, LoggerWithChild, LogLevel, TimestampFormat} from "./interface.js";
import {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
import {WinstonLogger} from "./winston.js";

const DATE_PATTERN = "YYYY-MM-DD";

export type LoggerNodeOpts = {
  level: LogLevel;
  /**
   * Enable file output transport if set
   */
  file?: {
    filepath: string;
    /**
     * Log level for file output transport
     */
    level: LogLevel;
    /**
     * Rotation config for file output transport
     */
    dailyRotate?: number;
  };
  /**
   * Module prefix for all logs
   */
  module?: string;
  /**
   * Rendering format for logs, defaults to "human"
   */
  format?: "human" | "json";
  /**
   * Set specific log levels by module
   */
  levelModule?: Record<string, LogLevel>;
  timestampFormat?: TimestampFormat;
};

export type LoggerNode = Omit<LoggerWithChild, "child"> & {
  toOpts(): LoggerNodeOpts;
  child(opts: LoggerChildOpts): LoggerNode;
};

/**
 * Setup a CLI logger, common for every process hosting validator duties
 */
export function getNodeLogger(opts: LoggerNodeOpts): LoggerNode {
  return WinstonLoggerNode.fromNewTransports(opts);
}

function getNodeLoggerTransports(opts: LoggerNodeOpts): winston.transport[] {
  const consoleTransport = new ConsoleDynamicLevel({
    // Set defaultLevel, not level for dynamic level setting of ConsoleDynamicLevel
    defaultLevel: opts.level,
    debugStdout: true,
    handleExceptions: true,
  });

  if (opts.levelModule) {
    for (const [module, level] of Object.entries(opts.levelModule)) {
      consoleTransport.setModuleLevel(module, level);
    }
  }

  const transports: TransportStream[] = [consoleTransport];

  if (opts.file) {
    const filename = opts.file.filepath;

    // dailyRotate > 0 keeps that many daily files, 0 or unset accumulates in the same file
    const enableDailyRotate = opts.file.dailyRotate != null && opts.file.dailyRotate > 0;

    transports.push(
      enableDailyRotate
        ? new DailyRotateFile({
            level: opts.file.level,
            //insert the date pattern in filename before the file extension.
            filename: filename.replace(/\.(?=[^.]*$)|$/, "-%DATE%$&"),
            datePattern: DATE_PATTERN,
            handleExceptions: true,
            maxFiles: opts.file.dailyRotate,
            auditFile: path.join(path.dirname(filename), ".log_rotate_audit.json"),
          })
        : new winston.transports.File({
            level: opts.file.level,
            filename: filename,
            handleExceptions: true,
          })
    );
  }

  return transports;
}

export class WinstonLoggerNode extends WinstonLogger implements LoggerNode {
  constructor(
    winston: Winston,
    private readonly opts: LoggerNodeOpts
  ) {
    super(winston);
  }

  static fromNewTransports(opts: LoggerNodeOpts): WinstonLoggerNode {
    // Level is controlled by the transports, see ConsoleDynamicLevel
    const winstonInstance = WinstonLogger.createWinstonInstance(
      {module: opts.module, format: opts.format, timestampFormat: opts.timestampFormat},
      getNodeLoggerTransports(opts)
    );
    return new WinstonLoggerNode(winstonInstance, opts);
  }

  child(opts: LoggerChildOpts): WinstonLoggerNode {
    const childWinston = this.childWinston(opts);
    const childModule = (childWinston.defaultMeta as {module: string}).module;
    return new WinstonLoggerNode(childWinston, {...this.opts, module: childModule});
  }

  toOpts(): LoggerNodeOpts {
    return this.opts;
  }
}
