import type { z } from 'zod';
import { parseEmotionKind, type ClassifierResponse } from '@moodlens/shared-contracts';
import { createEmotionAnalysis, createEmotionScore, type EmotionAnalysis, type EmotionScore } from '../../domains/entities';
import { ClassifierError } from '../../application/errors';

/**
 * Pull the JSON object out of model text, dropping markdown code fences
 */
export function extractJson(text: string): string {
  let content = text.trim();

  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1] !== undefined) {
    content = fenced[1].trim();
  } else {
    content = content.replace(/^```(?:json)?/, '').replace(/```$/, '').trim();
  }

  const object = content.match(/\{[\s\S]*\}/);
  return object ? object[0] : content;
}

export function parseModelJson<T>(text: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJson(text));
  } catch (error) {
    throw ClassifierError.decodeError(error instanceof Error ? error : new Error(String(error)));
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw ClassifierError.decodeError(new Error(issues.join('; ')));
  }
  return result.data;
}

/**
 * Unknown emotion names are dropped; the reported primaryEmotion is ignored
 * and re-derived from the scores.
 */
export function toEmotionAnalysis(response: ClassifierResponse, transcript?: string | null): EmotionAnalysis {
  const scores: EmotionScore[] = [];
  for (const emotion of response.emotions) {
    const kind = parseEmotionKind(emotion.name);
    if (kind) scores.push(createEmotionScore(kind, emotion.confidence));
  }

  return createEmotionAnalysis({
    scores,
    narrative: response.insight,
    voiceTranscript: transcript ?? null,
  });
}
