import path from 'path';
import winston from 'winston';
import { LoggingConfig, loadLoggingConfig } from './config';

export interface LogContext {
  userId?: string;
  guildId?: string;
  component?: string;
  operation?: string;
  metadata?: Record<string, unknown>;
}

class StructuredLogger {
  private logger: winston.Logger;

  constructor(config: LoggingConfig = loadLoggingConfig()) {
    this.logger = this.createLogger(config);
  }

  private createLogger(config: LoggingConfig): winston.Logger {
    const fileTransports = config.logDirectory
      ? [
          new winston.transports.File({
            filename: path.join(config.logDirectory, 'combined.log'),
            maxsize: 10 * 1024 * 1024, // 10MB
            maxFiles: 5,
            tailable: true
          }),
          new winston.transports.File({
            filename: path.join(config.logDirectory, 'error.log'),
            level: 'error',
            maxsize: 10 * 1024 * 1024, // 10MB
            maxFiles: 5,
            tailable: true
          })
        ]
      : [];

    return winston.createLogger({
      level: config.logLevel,
      silent: config.environment === 'test',
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss.SSS'
        }),
        winston.format.errors({ stack: true }),
        winston.format.json(),
        winston.format.printf((info) => {
          const { timestamp, level, message, ...meta } = info;
          return JSON.stringify({
            timestamp,
            level: level.toUpperCase(),
            message,
            ...meta
          });
        })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf((info) => {
              const { timestamp, level, message, component, operation, ...meta } = info;
              let logLine = `${timestamp} [${level}]`;

              if (component) logLine += ` [${component}]`;
              if (operation) logLine += ` [${operation}]`;

              logLine += `: ${message}`;

              const metaKeys = Object.keys(meta);
              if (metaKeys.length > 0) {
                logLine += ` ${JSON.stringify(meta)}`;
              }

              return logLine;
            })
          )
        }),
        ...fileTransports
      ]
    });
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.logger.error(message, {
      ...context,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : undefined
    });
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }

  validationError(field: string, rule: string, value: unknown, context?: LogContext): void {
    this.warn('Validation error', {
      ...context,
      component: context?.component ?? 'Validator',
      operation: 'validation',
      metadata: {
        field,
        rule,
        value: typeof value === 'object' ? JSON.stringify(value) : value
      }
    });
  }

  unknownEnumValue(enumName: string, code: number, context?: LogContext): void {
    this.debug('Unrecognized enum code', {
      ...context,
      component: 'EnumCodec',
      operation: 'decode',
      metadata: {
        enum: enumName,
        code
      }
    });
  }

  unknownFlagBits(flagSet: string, bits: bigint, context?: LogContext): void {
    this.debug('Unrecognized flag bits retained', {
      ...context,
      component: 'BitFlags',
      operation: 'decode',
      metadata: {
        flagSet,
        bits: bits.toString(2)
      }
    });
  }

  duplicateKey(collection: string, key: string, context?: LogContext): void {
    this.warn('Duplicate key in keyed collection, keeping last occurrence', {
      ...context,
      component: 'KeyedCollection',
      operation: 'decode',
      metadata: {
        collection,
        key
      }
    });
  }

  versionMismatch(expected: number, received: number, context?: LogContext): void {
    this.warn('Gateway protocol version mismatch', {
      ...context,
      component: 'ReadyCodec',
      operation: 'decode',
      metadata: {
        expected,
        received
      }
    });
  }

  performance(operation: string, duration: number, context?: LogContext): void {
    this.debug('Performance metric', {
      ...context,
      operation: 'performance',
      metadata: {
        operation,
        duration,
        unit: 'ms'
      }
    });
  }
}

export const logger = new StructuredLogger();
