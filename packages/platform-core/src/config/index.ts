/**
 * Configuration Module - Index
 */

export * from './environment-config.js';
