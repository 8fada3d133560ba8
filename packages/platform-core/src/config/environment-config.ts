/**
 * Environment Configuration Utilities
 *
 * .env loading, environment variable validation and typed lookups.
 */

import * as dotenv from 'dotenv';
import { getLogger } from '../logging/logger.js';
import { DomainError } from '../error-handling/errors.js';

const logger = getLogger('environment-config');

export interface EnvVarConfig {
  name: string;
  required: boolean;
  description: string;
  sensitive?: boolean;
}

/**
 * Load key-value entries from a .env file into process.env.
 * Existing variables are never overwritten.
 */
export function loadEnvironment(path?: string): string[] {
  const result = dotenv.config(path ? { path } : undefined);
  if (result.error) {
    logger.debug('No .env file loaded', { path: path ?? '.env', reason: result.error.message });
    return [];
  }
  return Object.keys(result.parsed ?? {});
}

/**
 * Validate environment using structured configuration
 */
export function validateEnvironmentConfig(
  configs: EnvVarConfig[],
  env: NodeJS.ProcessEnv = process.env
): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const config of configs) {
    const value = env[config.name];

    if (config.required && !value) {
      errors.push(`Missing required: ${config.name} - ${config.description}`);
    } else if (!config.required && !value) {
      warnings.push(`Optional not set: ${config.name} - ${config.description}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Fail fast at startup when required variables are missing
 */
export function assertEnvironment(configs: EnvVarConfig[], env: NodeJS.ProcessEnv = process.env): void {
  const result = validateEnvironmentConfig(configs, env);

  if (result.warnings.length > 0) {
    logger.debug('Optional env vars not configured', { count: result.warnings.length });
  }

  if (!result.valid) {
    throw new DomainError(
      `Environment validation failed:\n${result.errors.map(e => `  - ${e}`).join('\n')}`,
      500,
      undefined,
      'VALIDATION_ERROR'
    );
  }
}

export function isProduction(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'production';
}
