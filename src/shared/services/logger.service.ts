/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Centralized logging service using Winston.
 *
 * SECURITY:
 * - Never logs credential tokens or secrets
 * - Phone numbers are masked before they reach a log line
 * =============================================================================
 */

import winston from 'winston';
import { config } from '../../config/environment';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    let log = `${timestamp} [${level.toUpperCase()}]: ${message}`;

    const sanitizedMeta = sanitizeLogData(meta);
    if (Object.keys(sanitizedMeta).length > 0) {
      log += ` ${JSON.stringify(sanitizedMeta)}`;
    }

    if (stack) {
      log += `\n${stack}`;
    }

    return log;
  })
);

// Fields never written verbatim
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'authorization',
  'otp'
];

const PHONE_FIELDS = ['phone', 'phoneNumber'];

/**
 * Keep the last digits of a phone number, mask the rest
 */
export function maskPhone(phone: string, visible: number = 4): string {
  if (phone.length <= visible) return '*'.repeat(phone.length);
  return '*'.repeat(phone.length - visible) + phone.slice(-visible);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Remove sensitive fields from log data
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const isSensitive = SENSITIVE_FIELDS.some(field =>
      key.toLowerCase().includes(field.toLowerCase())
    );

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (PHONE_FIELDS.includes(key) && typeof value === 'string') {
      sanitized[key] = maskPhone(value);
    } else if (Array.isArray(value)) {
      sanitized[key] = value;
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

export const logger = winston.createLogger({
  level: config.logLevel,
  format: logFormat,
  silent: config.isTest && process.env.LOG_LEVEL === undefined,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),

    // File transports (production)
    ...(config.isProduction ? [
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5
      }),
      new winston.transports.File({
        filename: 'logs/combined.log',
        maxsize: 5242880,
        maxFiles: 5
      })
    ] : [])
  ]
});
