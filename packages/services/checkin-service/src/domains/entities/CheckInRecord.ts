import {
  parseEmotionKind,
  StoredEmotionScoreListSchema,
  StoredEmotionScoreSchema,
  type CheckInRecord,
  type StoredEmotionScore,
} from '@moodlens/shared-contracts';
import { createEmotionAnalysis, createEmotionScore, type EmotionAnalysis, type EmotionScore } from './Emotion';

export type { CheckInRecord };

export function normalizeNotes(notes: string | null | undefined): string | null {
  const trimmed = notes?.trim();
  return trimmed ? trimmed : null;
}

export function serializeScores(scores: readonly EmotionScore[]): string {
  const stored: StoredEmotionScore[] = scores.map(({ id, emotion, confidence }) => ({ id, emotion, confidence }));
  return JSON.stringify(stored);
}

export function toCheckInRecord(analysis: EmotionAnalysis, notes?: string | null): CheckInRecord {
  return {
    id: analysis.id,
    timestamp: analysis.createdAt,
    primaryEmotion: analysis.primaryEmotion,
    serializedScores: serializeScores(analysis.scores),
    userNotes: normalizeNotes(notes),
    narrative: analysis.narrative,
    voiceTranscript: analysis.voiceTranscript,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Valid subset of the stored scores. Malformed payloads and unknown kinds are skipped.
 */
export function decodeScores(record: Pick<CheckInRecord, 'serializedScores'>): EmotionScore[] {
  const list = StoredEmotionScoreListSchema.safeParse(parseJson(record.serializedScores));
  if (!list.success) return [];

  const scores: EmotionScore[] = [];
  for (const item of list.data) {
    const parsed = StoredEmotionScoreSchema.safeParse(item);
    if (!parsed.success) continue;
    const emotion = parseEmotionKind(parsed.data.emotion);
    if (!emotion) continue;
    scores.push(createEmotionScore(emotion, parsed.data.confidence, parsed.data.id));
  }
  return scores;
}

export function toEmotionAnalysis(record: CheckInRecord): EmotionAnalysis | null {
  if (!parseEmotionKind(record.primaryEmotion)) return null;

  return createEmotionAnalysis({
    id: record.id,
    createdAt: record.timestamp,
    scores: decodeScores(record),
    narrative: record.narrative,
    voiceTranscript: record.voiceTranscript,
  });
}
