export * from './emotion-kinds.js';
export * from './score-schemas.js';
export * from './checkin-record.js';
