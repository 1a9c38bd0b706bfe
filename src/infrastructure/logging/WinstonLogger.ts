import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { Logger, LogMeta } from '../../application/interfaces/Logger';

export interface WinstonLoggerOptions {
  level: string;
  /** Diagnostic log file; rotated daily when set */
  file?: string;
  datePattern?: string;
  maxSize?: string;
  maxFiles?: string;
}

export class WinstonLogger implements Logger {
  private readonly logger: winston.Logger;

  constructor(options: WinstonLoggerOptions) {
    const consoleTransport = new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, file, ...meta }) => {
          let logMessage = `${timestamp} [${level}]`;
          if (file) logMessage += ` [File:${file}]`;
          logMessage += `: ${message}`;

          if (Object.keys(meta).length > 0) {
            logMessage += ` ${JSON.stringify(meta)}`;
          }

          return logMessage;
        })
      )
    });

    // File transport with rotation
    const fileTransports = options.file
      ? [
          new DailyRotateFile({
            filename: options.file.replace(/\.log$/, '') + '-%DATE%.log',
            datePattern: options.datePattern || 'YYYY-MM-DD',
            maxSize: options.maxSize || '20m',
            maxFiles: options.maxFiles || '7d',
            format: winston.format.combine(
              winston.format.timestamp(),
              winston.format.json()
            )
          })
        ]
      : [];

    this.logger = winston.createLogger({
      level: options.level,
      levels: winston.config.npm.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [consoleTransport, ...fileTransports]
    });
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  /**
   * Wait for pending writes before the process exits.
   */
  public close(): Promise<void> {
    return new Promise(resolve => {
      this.logger.once('finish', () => resolve());
      this.logger.end();
    });
  }
}
