import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import util from 'util';

const rawLogLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const levelMap: Record<string, string> = {
  trace: 'silly',
  silly: 'silly',
  debug: 'debug',
  verbose: 'verbose',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'error',
};
const mappedLogLevel = levelMap[rawLogLevel];
const logLevel = mappedLogLevel || 'info';

if (!mappedLogLevel) {
  console.warn(`Unknown LOG_LEVEL="${rawLogLevel}", defaulting to "${logLevel}".`);
}

// Test runs only log to the console.
const fileLoggingEnabled = process.env.NODE_ENV !== 'test';

const logsDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
if (fileLoggingEnabled) {
  try {
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
  } catch (error) {
    console.warn('Failed to ensure logs directory exists:', error instanceof Error ? error.message : String(error));
  }
}

const customFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaKeys = Object.keys(meta);
    const metaSuffix =
      metaKeys.length > 0
        ? ` ${util.inspect(meta, { depth: 6, colors: false, breakLength: 120 })}`
        : '';
    return `${timestamp} [${level}]: ${message}${metaSuffix}`;
  })
);

function rotatingFile(prefix: string, maxFiles: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(logsDir, `${prefix}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    maxFiles,
    level,
    format: customFormat,
  });
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
  }),
];

if (fileLoggingEnabled) {
  transports.push(rotatingFile('bridge', '30d'));
  transports.push(rotatingFile('error', '90d', 'error'));
}

const logger = winston.createLogger({
  level: logLevel,
  transports,
  exitOnError: false,
  ...(fileLoggingEnabled && {
    exceptionHandlers: [
      new winston.transports.Console({ format: consoleFormat }),
      rotatingFile('exceptions', '90d'),
    ],
    rejectionHandlers: [
      new winston.transports.Console({ format: consoleFormat }),
      rotatingFile('rejections', '90d'),
    ],
  }),
});

export default logger;

export type LogMeta = Record<string, unknown>;

export interface LogContext {
  invocation_id?: string;
  command?: string;
  step?: string;
  batch_run_number?: number | string;
  [key: string]: unknown;
}

export interface ContextLogger {
  trace: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  fatal: (message: string, meta?: LogMeta) => void;
  child: (extra: LogContext) => ContextLogger;
}

export function createContextLogger(context: LogContext): ContextLogger {
  return {
    trace: (message, meta) => logger.log('silly', message, { ...context, ...meta }),
    debug: (message, meta) => logger.debug(message, { ...context, ...meta }),
    info: (message, meta) => logger.info(message, { ...context, ...meta }),
    warn: (message, meta) => logger.warn(message, { ...context, ...meta }),
    error: (message, meta) => logger.error(message, { ...context, ...meta }),
    fatal: (message, meta) => logger.log('error', message, { ...context, ...meta, fatal: true }),
    child: extra => createContextLogger({ ...context, ...extra }),
  };
}
