import { Logger, LoggerService, LogLevel } from '@nestjs/common';
import { WinstonModule } from 'nest-winston';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface WinstonLoggerOptions {
  /** Defaults to `CUA_LOG_DIR`, then `<tmpdir>/cua-logs`. */
  logDir?: string;
  /** Console level; files always record debug and above. */
  level?: string;
}

export interface LogLine {
  timestamp?: unknown;
  level: string;
  message: unknown;
  context?: unknown;
  stack?: unknown;
}

const QUIET_LEVELS: LogLevel[] = ['error', 'warn', 'log'];
const VERBOSE_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

let installed: winston.Logger | null = null;

export function formatLogLine({
  timestamp,
  level,
  message,
  context,
  stack,
}: LogLine): string {
  const contextStr = context ? `[${String(context)}] ` : '';
  const stackStr = stack ? `\n${String(stack)}` : '';
  return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
}

export function resolveLogDir(logDir?: string): string {
  const dir = logDir ?? process.env.CUA_LOG_DIR ?? path.join(os.tmpdir(), 'cua-logs');
  try {
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  } catch (error) {
    console.error(
      `Failed to create log directory ${dir}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return os.tmpdir();
  }
}

/**
 * Console plus two daily-rotated files: everything at debug, and errors
 * on their own.
 */
export function createWinstonLogger(
  options: WinstonLoggerOptions = {},
): winston.Logger {
  const logDir = resolveLogDir(options.logDir);

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf((info) => formatLogLine(info)),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
    }),
  );

  const fileRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'cua-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'debug',
  });

  const errorRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'cua-error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'error',
  });

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level: options.level ?? 'info',
  });

  return winston.createLogger({
    level: 'debug',
    transports: [consoleTransport, fileRotateTransport, errorRotateTransport],
  });
}

/** Routes every Nest `Logger` in the process through winston. */
export function installWinstonLogger(
  options: WinstonLoggerOptions = {},
): LoggerService {
  installed = createWinstonLogger(options);
  const service = WinstonModule.createLogger({ instance: installed });
  Logger.overrideLogger(service);
  return service;
}

/**
 * Shows debug and verbose output only when `verbose` is set.
 */
export function setLogVerbosity(verbose: boolean): void {
  if (installed) {
    const consoleLevel = verbose ? 'debug' : 'info';
    for (const transport of installed.transports) {
      if (transport instanceof winston.transports.Console) {
        transport.level = consoleLevel;
      }
    }
    return;
  }
  Logger.overrideLogger(verbose ? VERBOSE_LEVELS : QUIET_LEVELS);
}
