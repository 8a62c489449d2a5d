import { createLogger, format, transports, Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { Metadata } from '../types/common';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

export interface LogContext {
  userId?: string;
  connectionId?: string;
  handler?: string;
  operation?: string;
  fromHandler?: string;
  toHandler?: string;
  reason?: string;
  eventType?: string;
}

class SupportLogger {
  private logger: Logger;

  constructor(level: string = 'info') {
    const isProduction = process.env.NODE_ENV === 'production';

    this.logger = createLogger({
      level,
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        format.json(),
        format.printf(({ timestamp, level, message, event, userId, data, ...meta }) => {
          const messageStr = typeof message === 'string' ? message : String(message);
          return JSON.stringify({
            timestamp,
            level,
            event: event || messageStr.toLowerCase().replace(/\s+/g, '_'),
            userId,
            data: data || meta,
            message: messageStr
          });
        })
      ),
      transports: [
        new transports.Console({
          format: format.combine(
            format.colorize(),
            format.simple()
          )
        }),
        ...(isProduction ? [
          new DailyRotateFile({
            filename: 'logs/support-router-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles: '14d',
            format: format.json()
          }),
          new DailyRotateFile({
            filename: 'logs/error-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            level: 'error',
            maxSize: '20m',
            maxFiles: '30d',
            format: format.json()
          })
        ] : [
          new transports.File({
            filename: 'logs/support-router.log',
            format: format.json()
          }),
          new transports.File({
            filename: 'logs/error.log',
            level: 'error',
            format: format.json()
          })
        ])
      ]
    });
  }

  setLevel(level: string): void {
    this.logger.level = level;
  }

  log(level: LogLevel, message: string, context?: LogContext, meta?: Metadata) {
    this.logger.log(level, message, { ...context, ...meta });
  }

  /**
   * Structured log line with an explicit event name
   */
  event(eventName: string, context?: LogContext, meta?: Metadata) {
    this.logger.info(eventName, {
      event: eventName,
      data: meta,
      ...context
    });
  }

  info(message: string, context?: LogContext, meta?: Metadata) {
    this.log(LogLevel.INFO, message, context, meta);
  }

  error(message: string, error?: Error, context?: LogContext, meta?: Metadata) {
    this.log(LogLevel.ERROR, message, context, {
      error: error?.message,
      stack: error?.stack,
      ...meta
    });
  }

  warn(message: string, context?: LogContext, meta?: Metadata) {
    this.log(LogLevel.WARN, message, context, meta);
  }

  debug(message: string, context?: LogContext, meta?: Metadata) {
    this.log(LogLevel.DEBUG, message, context, meta);
  }

  // Specialized logging methods for routing operations
  logConversationStart(userId: string) {
    this.event('conversation_start', { userId, operation: 'conversation_start' });
  }

  logHandlerSwitch(fromHandler: string, toHandler: string, reason: string, context: LogContext) {
    this.info('Handler switch performed', {
      ...context,
      operation: 'handler_switch',
      fromHandler,
      toHandler,
      reason
    });
  }

  logEscalation(reason: string, context: LogContext, meta?: Metadata) {
    this.warn('Conversation escalated', {
      ...context,
      operation: 'escalation',
      toHandler: 'escalation',
      reason
    }, meta);
  }

  logFallback(failedHandler: string, errorMessage: string, context: LogContext) {
    this.warn('Handler failed, retrying with general handler', {
      ...context,
      operation: 'handler_fallback',
      fromHandler: failedHandler,
      toHandler: 'general'
    }, { error: errorMessage });
  }

  logError(error: Error, context: LogContext) {
    this.event('error', context, {
      message: error.message,
      stack: error.stack
    });
  }
}

export const logger = new SupportLogger(process.env.LOG_LEVEL || 'info');
