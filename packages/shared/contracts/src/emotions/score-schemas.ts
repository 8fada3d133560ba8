import { z } from 'zod';

/**
 * Shape of one entry in a check-in record's serialized score list.
 * `emotion` stays a plain string here; unknown kinds are filtered by the reader.
 */
export const StoredEmotionScoreSchema = z.object({
  id: z.string(),
  emotion: z.string(),
  confidence: z.number(),
});
export type StoredEmotionScore = z.infer<typeof StoredEmotionScoreSchema>;

export const StoredEmotionScoreListSchema = z.array(z.unknown());
