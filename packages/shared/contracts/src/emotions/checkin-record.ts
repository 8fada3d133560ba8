/**
 * Persisted check-in record. `primaryEmotion` is a raw string so rows written
 * by older builds still load; readers map it back through parseEmotionKind.
 */
export interface CheckInRecord {
  id: string;
  timestamp: Date;
  primaryEmotion: string;
  serializedScores: string;
  userNotes: string | null;
  narrative: string | null;
  voiceTranscript: string | null;
}
