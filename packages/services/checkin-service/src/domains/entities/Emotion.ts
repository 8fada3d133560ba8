import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_EMOTION, type EmotionKind } from '@moodlens/shared-contracts';

export interface EmotionScore {
  readonly id: string;
  readonly emotion: EmotionKind;
  readonly confidence: number;
}

/**
 * One classification result. Build it with createEmotionAnalysis so that
 * primaryEmotion always matches the scores.
 */
export interface EmotionAnalysis {
  readonly id: string;
  readonly createdAt: Date;
  readonly scores: readonly EmotionScore[];
  readonly primaryEmotion: EmotionKind;
  readonly narrative: string | null;
  readonly voiceTranscript: string | null;
}

export interface EmotionAnalysisInput {
  scores: readonly EmotionScore[];
  narrative?: string | null;
  voiceTranscript?: string | null;
  id?: string;
  createdAt?: Date;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function createEmotionScore(emotion: EmotionKind, confidence: number, id: string = uuidv4()): EmotionScore {
  return Object.freeze({ id, emotion, confidence: clampConfidence(confidence) });
}

// Strictly greater, so the first of equally confident scores wins
export function derivePrimaryEmotion(scores: readonly EmotionScore[]): EmotionKind {
  let best: EmotionScore | undefined;
  for (const score of scores) {
    if (!best || score.confidence > best.confidence) {
      best = score;
    }
  }
  return best?.emotion ?? DEFAULT_EMOTION;
}

export function createEmotionAnalysis(input: EmotionAnalysisInput): EmotionAnalysis {
  const seen = new Set<EmotionKind>();
  const scores: EmotionScore[] = [];
  for (const score of input.scores) {
    if (seen.has(score.emotion)) continue;
    seen.add(score.emotion);
    scores.push(createEmotionScore(score.emotion, score.confidence, score.id));
  }

  return Object.freeze({
    id: input.id ?? uuidv4(),
    createdAt: input.createdAt ?? new Date(),
    scores: Object.freeze(scores),
    primaryEmotion: derivePrimaryEmotion(scores),
    narrative: input.narrative ?? null,
    voiceTranscript: input.voiceTranscript ?? null,
  });
}

export function confidenceFor(analysis: EmotionAnalysis, emotion: EmotionKind): number {
  return analysis.scores.find(score => score.emotion === emotion)?.confidence ?? 0;
}
