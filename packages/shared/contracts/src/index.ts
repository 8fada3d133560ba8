/**
 * Shared contracts for the MoodLens packages
 *
 * Emotion vocabulary and AI wire formats, defined once as zod schemas
 */

export * from './emotions/index.js';

export * from './ai/index.js';
