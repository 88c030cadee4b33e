import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LoggingOptions {
  level: string;
  toFile: boolean;
}

const isTestRun = process.env.NODE_ENV === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

function buildTransports(toFile: boolean): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      silent: isTestRun,
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (toFile && !isTestRun) {
    transports.push(
      new winston.transports.File({ filename: 'error.log', level: 'error' }),
      new DailyRotateFile({
        filename: 'combined-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '7d',
        zippedArchive: false,
      }),
    );
  }

  return transports;
}

// Every Logger is a child of this instance, so configureLogging() reaches all of them.
const root = winston.createLogger({
  level: 'info',
  format: logFormat,
  transports: buildTransports(false),
});

export function configureLogging(options: LoggingOptions): void {
  root.configure({
    level: options.level,
    format: logFormat,
    transports: buildTransports(options.toFile),
  });
}

export type LogMeta = Record<string, unknown>;

function toMeta(detail: unknown): LogMeta | undefined {
  if (detail === undefined) return undefined;
  if (detail instanceof Error) {
    return { error: detail.message, name: detail.name, stack: detail.stack };
  }
  if (typeof detail === 'object' && detail !== null) {
    return Object.fromEntries(Object.entries(detail));
  }
  return { detail: String(detail) };
}

export class Logger {
  private readonly logger: winston.Logger;

  constructor(context: string) {
    this.logger = root.child({ context });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  error(message: string, error?: unknown): void {
    this.logger.error(message, toMeta(error));
  }

  warn(message: string, meta?: unknown): void {
    this.logger.warn(message, toMeta(meta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }
}
