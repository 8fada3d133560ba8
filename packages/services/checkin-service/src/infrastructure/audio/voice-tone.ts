export const NEUTRAL_TONE = 'neutral tone';

export function describeVoiceTone(rms: number): string {
  if (!Number.isFinite(rms)) return NEUTRAL_TONE;
  if (rms > 0.3) return 'energetic, loud tone';
  if (rms > 0.15) return 'confident, clear tone';
  if (rms > 0.05) return 'calm, soft tone';
  return 'quiet, subdued tone';
}

export function computeRms(samples: ArrayLike<number>): number {
  if (samples.length === 0) return Number.NaN;
  let sumSquared = 0;
  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i];
    sumSquared += sample * sample;
  }
  return Math.sqrt(sumSquared / samples.length);
}

/**
 * Tone descriptor for a mono PCM buffer normalised to [-1, 1]
 */
export function describeSamples(samples: ArrayLike<number>): string {
  return describeVoiceTone(computeRms(samples));
}
