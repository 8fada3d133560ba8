import { z } from 'zod';

/**
 * The closed set of emotion categories. Order matters: it is the
 * deterministic tie-break order wherever counts or confidences are equal.
 */
export const EMOTION_KINDS = [
  'happy',
  'sad',
  'angry',
  'anxious',
  'neutral',
  'excited',
  'fearful',
  'disgusted',
  'surprised',
  'calm',
] as const;

export const EmotionKindSchema = z.enum(EMOTION_KINDS);
export type EmotionKind = z.infer<typeof EmotionKindSchema>;

export const DEFAULT_EMOTION: EmotionKind = 'neutral';

/**
 * Lenient lookup for model or storage output: case and surrounding whitespace are ignored.
 */
export function parseEmotionKind(raw: string | null | undefined): EmotionKind | null {
  if (!raw) return null;
  const parsed = EmotionKindSchema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : null;
}

export function emotionOrder(kind: EmotionKind): number {
  return EMOTION_KINDS.indexOf(kind);
}
