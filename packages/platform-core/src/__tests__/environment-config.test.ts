import { describe, it, expect } from 'vitest';
import { assertEnvironment, isProduction, validateEnvironmentConfig, type EnvVarConfig } from '../config/environment-config.js';
import { DomainError } from '../error-handling/errors.js';

const VARS: EnvVarConfig[] = [
  { name: 'GEMINI_API_KEY', required: true, description: 'Gemini API key', sensitive: true },
  { name: 'MOODLENS_DATA_DIR', required: false, description: 'Database directory' },
];

describe('validateEnvironmentConfig', () => {
  it('should report missing required variables as errors', () => {
    const result = validateEnvironmentConfig(VARS, {});
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Missing required: GEMINI_API_KEY - Gemini API key']);
    expect(result.warnings).toEqual(['Optional not set: MOODLENS_DATA_DIR - Database directory']);
  });

  it('should pass when required variables are present', () => {
    const result = validateEnvironmentConfig(VARS, { GEMINI_API_KEY: 'test-secret', MOODLENS_DATA_DIR: 'memory://' });
    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });
});

describe('assertEnvironment', () => {
  it('should throw a validation error listing every missing variable', () => {
    expect(() => assertEnvironment(VARS, {})).toThrow(DomainError);
    expect(() => assertEnvironment(VARS, {})).toThrow(
      'Environment validation failed:\n  - Missing required: GEMINI_API_KEY - Gemini API key'
    );
  });

  it('should not throw when only optional variables are missing', () => {
    expect(() => assertEnvironment(VARS, { GEMINI_API_KEY: 'test-secret' })).not.toThrow();
  });
});

describe('isProduction', () => {
  it('should only be true for NODE_ENV=production', () => {
    expect(isProduction({ NODE_ENV: 'production' })).toBe(true);
    expect(isProduction({ NODE_ENV: 'test' })).toBe(false);
    expect(isProduction({})).toBe(false);
  });
});
