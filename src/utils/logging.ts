import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

interface CallerInfo {
  file?: string;
  line?: number;
  function?: string;
}

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private writeFiles: boolean;

  constructor() {
    this.logLevel = appConfig.logLevel;
    this.rotation = process.env.LOG_ROTATION || '10MB';
    this.retention = process.env.LOG_RETENTION || '30d';
    this.compression = true;
    this.logDir = process.env.LOG_DIR || path.join(__dirname, '../../logs');
    this.writeFiles = appConfig.nodeEnv !== 'test';

    if (this.writeFiles && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private getCallerInfo(): CallerInfo {
    const originalFunc = Error.prepareStackTrace;
    let frames: NodeJS.CallSite[] = [];

    try {
      Error.prepareStackTrace = (_err, stack) => {
        frames = stack;
        return '';
      };
      const err = new Error();
      if (err.stack === undefined) {
        return {};
      }
    } finally {
      Error.prepareStackTrace = originalFunc;
    }

    // Skip getCallerInfo itself and the winston format function
    for (let i = 2; i < frames.length; i++) {
      const frame = frames[i];
      const file = frame.getFileName();

      if (file && !file.includes('node_modules') && !file.includes('winston')) {
        return {
          file,
          line: frame.getLineNumber() ?? undefined,
          function: frame.getFunctionName() || 'anonymous',
        };
      }
    }

    return {};
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const callerInfo = this.getCallerInfo();
    const location = callerInfo.file && callerInfo.line
      ? ` | ${callerInfo.file}:${callerInfo.line}${callerInfo.function ? ` (${callerInfo.function})` : ''}`
      : '';

    const stackStr = stack ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${timestamp} | ${level} | ${message}${location}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createRotatingFile(prefix: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);

    return new DailyRotateFile({
      filename: path.join(this.logDir, `${prefix}-%DATE%.log`),
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
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
      silent: !this.writeFiles,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
    }));

    if (this.writeFiles) {
      logger.add(this.createRotatingFile('sys'));
      logger.add(this.createRotatingFile('error', 'error'));
      // All levels
      logger.add(this.createRotatingFile('combined', 'silly'));
    }

    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
