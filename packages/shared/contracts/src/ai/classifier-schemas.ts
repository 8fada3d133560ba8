/**
 * Emotion classifier wire contracts
 *
 * What the language model is asked to return, and the envelope of the
 * generateContent endpoint that carries it.
 */

import { z } from 'zod';

export const ClassifiedEmotionSchema = z.object({
  name: z.string(),
  confidence: z.number(),
});
export type ClassifiedEmotion = z.infer<typeof ClassifiedEmotionSchema>;

// primaryEmotion is informational only; consumers re-derive it from the scores
export const ClassifierResponseSchema = z.object({
  emotions: z.array(ClassifiedEmotionSchema),
  primaryEmotion: z.string().optional(),
  insight: z.string(),
});
export type ClassifierResponse = z.infer<typeof ClassifierResponseSchema>;

export const InsightsResponseSchema = z.object({
  insights: z.array(z.string()),
});
export type InsightsResponse = z.infer<typeof InsightsResponseSchema>;

export const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() }).passthrough()),
        }),
      })
    )
    .min(1),
});
export type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;

export const GenerateContentErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
    status: z.string().optional(),
  }),
});
