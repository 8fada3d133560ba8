import { EMOTION_KINDS } from '@moodlens/shared-contracts';

const EMOTION_NAMES = EMOTION_KINDS.join(', ');

const ANALYSIS_RESPONSE_FORMAT = `{
  "emotions": [
    {"name": "happy", "confidence": 0.8},
    {"name": "calm", "confidence": 0.5}
  ],
  "primaryEmotion": "happy",
  "insight": "A brief empathetic insight about their emotional state (2-3 sentences)"
}`;

export interface VoiceContext {
  voiceTone?: string | null;
  transcript?: string | null;
}

export function buildImagePrompt({ voiceTone, transcript }: VoiceContext): string {
  const lines = ["Analyze the person's facial expression in this image to determine their emotional state.", ''];

  if (voiceTone) lines.push(`Additional context - Voice tone: ${voiceTone}`);
  if (transcript) lines.push(`Additional context - They said: "${transcript}"`);

  lines.push(
    '',
    'Based on the facial expression (and any additional context), return ONLY valid JSON:',
    ANALYSIS_RESPONSE_FORMAT,
    '',
    `Use only these emotion names: ${EMOTION_NAMES}`,
    '',
    'Be empathetic and supportive in the insight.'
  );
  return lines.join('\n');
}

export function buildDescriptionPrompt(faceDescription: string, { voiceTone, transcript }: VoiceContext): string {
  const lines = ['Analyze the emotional state based on:', `- Facial expression: ${faceDescription}`];

  if (voiceTone) lines.push(`- Voice tone: ${voiceTone}`);
  if (transcript) lines.push(`- Spoken words: "${transcript}"`);

  lines.push(
    '',
    'Return ONLY valid JSON with emotions and confidence scores (0-1):',
    ANALYSIS_RESPONSE_FORMAT,
    '',
    `Use only these emotion names: ${EMOTION_NAMES}`,
    '',
    'Be empathetic and supportive in the insight. Make it personal and helpful.'
  );
  return lines.join('\n');
}

export function buildInsightsPrompt(summaryLines: readonly string[]): string {
  return [
    'Analyze emotional patterns from recent check-ins:',
    '',
    'Data:',
    ...summaryLines,
    '',
    'Identify:',
    '1. Most common emotions',
    '2. Time-of-day patterns',
    '3. Potential triggers or trends',
    '4. Positive improvements',
    '',
    'Return ONLY valid JSON with 3-5 actionable insights:',
    '{',
    '  "insights": [',
    '    "Your mood is most positive in the mornings",',
    '    "Consider a short breathing exercise before stressful meetings"',
    '  ]',
    '}',
    '',
    'Keep insights supportive, actionable, and specific to the data.',
  ].join('\n');
}
