/**
 * Log Formatting
 *
 * Log formatters and secret redaction utilities
 */

import * as winston from 'winston';
import type { LogContext } from './types.js';

// Secret patterns to redact (key-based matching)
const SECRET_PATTERNS = [/authorization/i, /^key$/i, /api[-_]?key/i, /token/i, /secret/i, /password/i, /bearer/i];

// Check-in content fields - what the user said or wrote about how they feel
const CHECKIN_CONTENT_FIELDS = ['notes', 'userNotes', 'transcript', 'voiceTranscript', 'narrative'];

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE_PATTERN = /\b(?:\+\d{1,3}[-.\s]?)?(?:\(?\d{3}\)?[-.\s])\d{3}[-.\s]?\d{4}\b/g;

/**
 * Mask an email address preserving first 2 chars + domain hint
 * example@domain.com -> ex***@d***.com
 */
export function maskEmail(email: string): string {
  const atIndex = email.indexOf('@');
  if (atIndex < 1) return '[EMAIL]';

  const local = email.substring(0, atIndex);
  const domain = email.substring(atIndex + 1);
  const domainParts = domain.split('.');

  const maskedLocal = local.length > 2 ? local.substring(0, 2) + '***' : local.charAt(0) + '***';
  const maskedDomain =
    domainParts.length > 1
      ? domainParts[0].charAt(0) + '***.' + domainParts[domainParts.length - 1]
      : domain.charAt(0) + '***';

  return `${maskedLocal}@${maskedDomain}`;
}

/**
 * Mask a phone number preserving last 4 digits
 * +1-555-123-4567 -> ***-4567
 */
export function maskPhone(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  if (digits.length < 4) return '[PHONE]';
  return '***-' + digits.slice(-4);
}

export function sanitizePiiInString(value: string): string {
  return value.replace(EMAIL_PATTERN, match => maskEmail(match)).replace(PHONE_PATTERN, match => maskPhone(match));
}

/**
 * Redacts secrets (API keys, tokens) and check-in content by key name,
 * and masks e-mail addresses and phone numbers inside remaining strings
 */
export function sanitizeForLogging(obj: unknown, maxDepth = 5): unknown {
  if (typeof obj === 'string') {
    return sanitizePiiInString(obj);
  }

  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => sanitizeForLogging(item, maxDepth - 1));
  }

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else if (CHECKIN_CONTENT_FIELDS.includes(key) && value !== null && value !== undefined) {
      masked[key] = '[CONTENT_REDACTED]';
    } else {
      masked[key] = sanitizeForLogging(value, maxDepth - 1);
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(sanitizeForLogging(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

/**
 * Development console format
 */
export function createDevFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, module: moduleCtx, env: _env, version: _version, ...meta }) => {
      const context = correlationStorage.getStore();
      const finalCorrelationId = correlationId || context?.correlationId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 8)}]` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(correlationStorage: {
  getStore: () => LogContext | undefined;
}): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.correlationId = info.correlationId || context.correlationId;
        info.checkInId = info.checkInId || context.checkInId;
      }

      return safeStringify(info, 50000);
    })
  );
}
