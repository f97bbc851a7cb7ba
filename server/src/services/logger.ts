/**
 * Structured Logging Service
 *
 * Uses Winston for structured JSON logging with:
 * - Console output (colored in dev)
 * - File output (JSON format), skipped under test
 * - Log levels: error, warn, info, http, debug
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';

const isTest = process.env.NODE_ENV === 'test';
const isProduction = process.env.NODE_ENV === 'production';
const logsDir = path.resolve(process.cwd(), process.env.LOG_DIR || 'logs');

if (!isTest && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

function fileTransports(): winston.transport[] {
  if (isTest) return [];
  return [
    // All logs
    new winston.transports.File({
      filename: path.join(logsDir, 'voice-server.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),
    // Errors only
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
  ];
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'voice-server' },
  transports: [
    new winston.transports.Console({
      format: isProduction ? logFormat : consoleFormat,
      silent: isTest,
    }),
    ...fileTransports(),
  ],
});

// Audit logger for tool executions and outbound messages
export const auditLogger = winston.createLogger({
  level: 'info',
  format: logFormat,
  defaultMeta: { service: 'voice-audit' },
  transports: isTest
    ? [new winston.transports.Console({ silent: true })]
    : [
        new winston.transports.File({
          filename: path.join(logsDir, 'audit.log'),
          maxsize: 50 * 1024 * 1024,
          maxFiles: 10,
        }),
      ],
});

/**
 * Log a security-relevant event
 */
export function auditLog(action: string, details: Record<string, unknown>): void {
  auditLogger.info(action, {
    timestamp: new Date().toISOString(),
    ...details,
  });
}

/**
 * Normalize an unknown thrown value for log metadata
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
