import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private isTest: boolean;

  constructor() {
    this.logLevel = appConfig.logLevel;
    this.rotation = process.env.LOG_ROTATION || '10MB';
    this.retention = process.env.LOG_RETENTION || '30 days';
    this.compression = true;
    this.logDir = appConfig.logDir;
    this.isTest = appConfig.nodeEnv === 'test';

    if (!this.isTest && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.colorize({ all: true }),
      winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
        const stackStr = stack ? `\n${stack}` : '';
        const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
        return `${timestamp} | ${level} | ${message}${metaStr}${stackStr}`;
      })
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
        const stackStr = stack ? `\nStack: ${stack}` : '';
        const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
        return `${timestamp} | ${level} | ${message}${metaStr}${stackStr}`;
      })
    );
  }

  parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (/(KB|MB|GB)$/i.test(rotation)) {
      return { maxSize: rotation.toLowerCase().replace('b', '') };
    }
    if (/hour/i.test(rotation)) {
      return { datePattern: 'YYYY-MM-DD-HH' };
    }
    if (/day/i.test(rotation)) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10m' };
  }

  // "30 days" -> "30d"
  parseRetention(retention: string): string {
    const match = retention.match(/(\d+)\s*(days?|d|hours?|h)/i);
    if (match) {
      const [, num, unit] = match;
      return unit.toLowerCase().startsWith('h') ? `${num}h` : `${num}d`;
    }
    return '30d';
  }

  private createRotatingFile(name: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel.toLowerCase(),
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel.toLowerCase(),
      format: this.createConsoleFormat(),
      silent: this.isTest,
    }));

    if (this.isTest) {
      return logger;
    }

    logger.add(this.createRotatingFile('sys'));
    logger.add(this.createRotatingFile('error', 'error'));
    logger.add(this.createRotatingFile('combined', 'silly'));

    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };

/**
 * Security-relevant events (register, login, logout, password reset, role change).
 */
export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
