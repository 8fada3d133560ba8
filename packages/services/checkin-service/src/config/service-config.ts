/**
 * Configuration for checkin-service
 * Environment entries are read once at startup and validated with zod.
 */

import { z } from 'zod';
import { DomainError, type EnvVarConfig } from '@moodlens/platform-core';
import type * as winston from 'winston';

export type Logger = winston.Logger;

export { createLogger as getLogger } from '@moodlens/platform-core';

export const DEFAULT_GEMINI_MODEL = 'gemini-3-flash-preview';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export const CHECKIN_ENV_VARS: EnvVarConfig[] = [
  { name: 'GEMINI_API_KEY', required: false, description: 'Gemini API key; the offline classifier is used when absent', sensitive: true },
  { name: 'GEMINI_MODEL', required: false, description: 'Model used for classification and insights' },
  { name: 'GEMINI_BASE_URL', required: false, description: 'Generative Language API base URL' },
  { name: 'GEMINI_TIMEOUT_MS', required: false, description: 'Request timeout for classifier calls' },
  { name: 'CHECKIN_DATA_DIR', required: false, description: 'Directory of the embedded check-in database, or memory:// for a throwaway store' },
  { name: 'CHECKIN_IMAGE_MAX_BYTES', required: false, description: 'Upload size ceiling for prepared photos' },
  { name: 'CHECKIN_IMAGE_MAX_DIMENSION', required: false, description: 'Longest edge of prepared photos' },
  { name: 'INSIGHTS_WINDOW_DAYS', required: false, description: 'Trailing window for insight generation' },
  { name: 'INSIGHTS_MAX_ENTRIES', required: false, description: 'Records included in the insights summary' },
];

const optionalString = z
  .string()
  .trim()
  .transform(value => (value.length > 0 ? value : undefined))
  .optional();

const CheckInEnvSchema = z.object({
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_GEMINI_MODEL),
  GEMINI_BASE_URL: z.string().url().default(DEFAULT_GEMINI_BASE_URL),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CHECKIN_DATA_DIR: z.string().trim().min(1).default('./moodlens-data'),
  CHECKIN_IMAGE_MAX_BYTES: z.coerce.number().int().positive().default(500 * 1024),
  CHECKIN_IMAGE_MAX_DIMENSION: z.coerce.number().int().positive().default(512),
  INSIGHTS_WINDOW_DAYS: z.coerce.number().int().positive().default(30),
  INSIGHTS_MAX_ENTRIES: z.coerce.number().int().positive().default(30),
});

export interface CheckInConfig {
  gemini: {
    apiKey: string | undefined;
    model: string;
    baseUrl: string;
    timeoutMs: number;
  };
  database: {
    dataDir: string;
  };
  image: {
    maxBytes: number;
    maxDimension: number;
  };
  insights: {
    windowDays: number;
    maxEntries: number;
  };
}

export function loadCheckInConfig(env: NodeJS.ProcessEnv = process.env): CheckInConfig {
  const result = CheckInEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new DomainError(
      `Invalid check-in configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`,
      500,
      undefined,
      'VALIDATION_ERROR',
      { issues }
    );
  }

  const parsed = result.data;
  return {
    gemini: {
      apiKey: parsed.GEMINI_API_KEY,
      model: parsed.GEMINI_MODEL,
      baseUrl: parsed.GEMINI_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: parsed.GEMINI_TIMEOUT_MS,
    },
    database: { dataDir: parsed.CHECKIN_DATA_DIR },
    image: {
      maxBytes: parsed.CHECKIN_IMAGE_MAX_BYTES,
      maxDimension: parsed.CHECKIN_IMAGE_MAX_DIMENSION,
    },
    insights: {
      windowDays: parsed.INSIGHTS_WINDOW_DAYS,
      maxEntries: parsed.INSIGHTS_MAX_ENTRIES,
    },
  };
}
