export { createMockCheckInRecord, createDailyRecords, serializeScores, atLocal } from './entity-factories.js';
