import { v4 as uuidv4 } from 'uuid';
import type { CheckInRecord, StoredEmotionScore } from '@moodlens/shared-contracts';

/**
 * Local wall-clock time; analytics bucket by local day and hour, so fixtures
 * must not depend on the machine's time zone.
 */
export function atLocal(year: number, month: number, day: number, hour = 12, minute = 0): Date {
  return new Date(year, month - 1, day, hour, minute, 0, 0);
}

export function serializeScores(scores: ReadonlyArray<{ emotion: string; confidence: number }>): string {
  const stored: StoredEmotionScore[] = scores.map(score => ({
    id: uuidv4(),
    emotion: score.emotion,
    confidence: score.confidence,
  }));
  return JSON.stringify(stored);
}

export function createMockCheckInRecord(
  overrides: Partial<CheckInRecord> & { confidence?: number } = {}
): CheckInRecord {
  const { confidence = 0.8, ...fields } = overrides;
  const primaryEmotion = fields.primaryEmotion ?? 'happy';
  return {
    id: uuidv4(),
    timestamp: atLocal(2024, 3, 1, 9),
    primaryEmotion,
    serializedScores: serializeScores([{ emotion: primaryEmotion, confidence }]),
    userNotes: null,
    narrative: 'Test narrative',
    voiceTranscript: null,
    ...fields,
  };
}

/**
 * One record per entry, at noon local time on consecutive days starting at `start`
 */
export function createDailyRecords(start: Date, emotions: readonly string[]): CheckInRecord[] {
  return emotions.map((primaryEmotion, offset) =>
    createMockCheckInRecord({
      primaryEmotion,
      timestamp: new Date(start.getFullYear(), start.getMonth(), start.getDate() + offset, 12, 0),
    })
  );
}
