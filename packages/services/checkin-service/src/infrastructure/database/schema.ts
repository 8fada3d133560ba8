import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';

export const checkinRecords = pgTable(
  'checkin_records',
  {
    id: text('id').primaryKey(),
    timestamp: timestamp('timestamp', { withTimezone: true, mode: 'date' }).notNull(),
    primaryEmotion: text('primary_emotion').notNull(),
    serializedScores: text('serialized_scores').notNull().default('[]'),
    userNotes: text('user_notes'),
    narrative: text('narrative'),
    voiceTranscript: text('voice_transcript'),
  },
  table => ({
    timestampIdx: index('checkin_records_timestamp_idx').on(table.timestamp),
    primaryEmotionIdx: index('checkin_records_primary_emotion_idx').on(table.primaryEmotion),
  })
);

export type CheckInRecordRow = typeof checkinRecords.$inferSelect;
export type NewCheckInRecordRow = typeof checkinRecords.$inferInsert;
