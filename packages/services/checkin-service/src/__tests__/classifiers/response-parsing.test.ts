import { describe, it, expect } from 'vitest';
import { ClassifierResponseSchema, InsightsResponseSchema } from '@moodlens/shared-contracts';
import { extractJson, parseModelJson, toEmotionAnalysis } from '../../infrastructure/classifiers/response-parsing';
import { ClassifierError } from '../../application/errors';
import { buildDescriptionPrompt, buildImagePrompt, buildInsightsPrompt } from '../../infrastructure/classifiers/prompts';

describe('extractJson', () => {
  it('should unwrap a fenced json block', () => {
    expect(extractJson('Here you go:\n```json\n{"insights":["a"]}\n```\nThanks')).toBe('{"insights":["a"]}');
  });

  it('should unwrap a fence without a language tag', () => {
    expect(extractJson('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('should cut surrounding prose from a bare object', () => {
    expect(extractJson('Sure! {"a":{"b":2}} Hope this helps')).toBe('{"a":{"b":2}}');
  });

  it('should return text without an object unchanged', () => {
    expect(extractJson('  no json here  ')).toBe('no json here');
  });
});

describe('parseModelJson', () => {
  it('should validate against the schema', () => {
    expect(parseModelJson('{"insights":["Rest more"]}', InsightsResponseSchema)).toEqual({ insights: ['Rest more'] });
  });

  it('should raise a decode error for invalid JSON', () => {
    expect(() => parseModelJson('{"insights": [', InsightsResponseSchema)).toThrow(ClassifierError);
  });

  it('should name the failing path when the shape is wrong', () => {
    expect(() => parseModelJson('{"insights":"Rest more"}', InsightsResponseSchema)).toThrow(
      /^Failed to decode response: insights: /
    );
  });
});

describe('toEmotionAnalysis', () => {
  it('should drop unknown names and re-derive the primary emotion', () => {
    const response = ClassifierResponseSchema.parse({
      emotions: [
        { name: 'Happy', confidence: 0.4 },
        { name: 'melancholic', confidence: 0.95 },
        { name: 'calm', confidence: 0.7 },
      ],
      primaryEmotion: 'melancholic',
      insight: 'You seem settled.',
    });

    const analysis = toEmotionAnalysis(response, 'feeling fine');

    expect(analysis.scores.map(score => [score.emotion, score.confidence])).toEqual([
      ['happy', 0.4],
      ['calm', 0.7],
    ]);
    expect(analysis.primaryEmotion).toBe('calm');
    expect(analysis.narrative).toBe('You seem settled.');
    expect(analysis.voiceTranscript).toBe('feeling fine');
  });

  it('should default to neutral when nothing is recognised', () => {
    const analysis = toEmotionAnalysis({ emotions: [{ name: 'bored', confidence: 1 }], insight: '' });
    expect(analysis.scores).toEqual([]);
    expect(analysis.primaryEmotion).toBe('neutral');
    expect(analysis.voiceTranscript).toBeNull();
  });
});

describe('prompts', () => {
  it('should include voice context only when present', () => {
    const withVoice = buildImagePrompt({ voiceTone: 'calm, soft tone', transcript: 'long day' });
    expect(withVoice).toContain('Additional context - Voice tone: calm, soft tone');
    expect(withVoice).toContain('Additional context - They said: "long day"');

    expect(buildImagePrompt({})).not.toContain('Additional context');
  });

  it('should list the allowed emotion names', () => {
    expect(buildDescriptionPrompt('furrowed brow', {})).toContain(
      'Use only these emotion names: happy, sad, angry, anxious, neutral, excited, fearful, disgusted, surprised, calm'
    );
  });

  it('should embed the summary lines', () => {
    const prompt = buildInsightsPrompt(['- 2024-03-01T09:00: happy']);
    expect(prompt.split('\n').slice(0, 4)).toEqual([
      'Analyze emotional patterns from recent check-ins:',
      '',
      'Data:',
      '- 2024-03-01T09:00: happy',
    ]);
  });
});
