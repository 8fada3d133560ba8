/**
 * Platform Core - shared utilities for the MoodLens packages
 *
 * - Structured logging with correlation tracking
 * - Domain error patterns
 * - Environment configuration utilities
 */

export * from './config/index.js';
export * from './error-handling/index.js';
export * from './logging/index.js';
