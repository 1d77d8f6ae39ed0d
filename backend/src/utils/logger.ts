/**
 * Structured logging utility with correlation ID support
 * Provides consistent logging format and error tracking
 */

import { randomUUID } from 'crypto';
import { config } from '../config/env.js';

// Log levels
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const LEVEL_RANK: Record<`${LogLevel}`, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50
};

// Interface for structured log entries
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  orderId?: string;
  tableId?: string;
  context?: string;
  data?: unknown;
  error?: unknown;
}

export interface LogOptions {
  correlationId?: string;
  orderId?: string | number;
  tableId?: string | number;
  context?: string;
  data?: unknown;
  error?: unknown;
}

/**
 * Create a new correlation ID for tracking one request through the services
 */
export function createCorrelationId(): string {
  return `corr-${randomUUID()}`;
}

/**
 * Format an error object for logging
 */
export function formatError(error: unknown): unknown {
  if (!error) return undefined;

  // If it's an Error object, extract useful properties
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause ? formatError(error.cause) : undefined
    };
  }

  return error;
}

function shouldLog(level: LogLevel): boolean {
  if (config.LOG_LEVEL === 'silent') return false;
  return LEVEL_RANK[level] >= LEVEL_RANK[config.LOG_LEVEL];
}

/**
 * Create a structured log entry
 */
export function createLogEntry(level: LogLevel, message: string, options?: LogOptions): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    correlationId: options?.correlationId,
    orderId: options?.orderId !== undefined ? String(options.orderId) : undefined,
    tableId: options?.tableId !== undefined ? String(options.tableId) : undefined,
    context: options?.context,
    data: options?.data,
    error: options?.error ? formatError(options.error) : undefined
  };
}

function outputLogEntry(entry: LogEntry): void {
  if (!shouldLog(entry.level)) return;

  const logString = JSON.stringify(entry);

  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(logString);
      break;
    case LogLevel.INFO:
      console.info(logString);
      break;
    case LogLevel.WARN:
      console.warn(logString);
      break;
    case LogLevel.ERROR:
    case LogLevel.FATAL:
      console.error(logString);
      break;
    default:
      console.log(logString);
  }
}

export function debug(message: string, options?: LogOptions): void {
  outputLogEntry(createLogEntry(LogLevel.DEBUG, message, options));
}

export function info(message: string, options?: LogOptions): void {
  outputLogEntry(createLogEntry(LogLevel.INFO, message, options));
}

export function warn(message: string, options?: LogOptions): void {
  outputLogEntry(createLogEntry(LogLevel.WARN, message, options));
}

export function error(message: string, options?: LogOptions): void {
  outputLogEntry(createLogEntry(LogLevel.ERROR, message, options));
}

export function fatal(message: string, options?: LogOptions): void {
  outputLogEntry(createLogEntry(LogLevel.FATAL, message, options));
}

