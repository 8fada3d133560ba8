export * from './classifier-schemas.js';
