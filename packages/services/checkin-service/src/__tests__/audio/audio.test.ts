import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../../config/service-config')>()),
  getLogger: vi.fn(() => mockLogger),
}));

import { AudioLevelMeter, powerToLevel } from '../../infrastructure/audio/AudioLevelMeter';
import { NEUTRAL_TONE, computeRms, describeSamples, describeVoiceTone } from '../../infrastructure/audio/voice-tone';
import { UnavailableVoiceTranscriber } from '../../infrastructure/audio/UnavailableVoiceTranscriber';

describe('voice tone', () => {
  it('should describe loudness bands', () => {
    expect(describeVoiceTone(0.4)).toBe('energetic, loud tone');
    expect(describeVoiceTone(0.2)).toBe('confident, clear tone');
    expect(describeVoiceTone(0.1)).toBe('calm, soft tone');
    expect(describeVoiceTone(0.01)).toBe('quiet, subdued tone');
    expect(describeVoiceTone(Number.NaN)).toBe(NEUTRAL_TONE);
  });

  it('should compute the root mean square of samples', () => {
    expect(computeRms([0.5, -0.5, 0.5, -0.5])).toBe(0.5);
    expect(computeRms([])).toBeNaN();
  });

  it('should describe a PCM buffer', () => {
    expect(describeSamples(new Float32Array([0.2, -0.2, 0.2]))).toBe('confident, clear tone');
    expect(describeSamples([])).toBe(NEUTRAL_TONE);
  });
});

describe('powerToLevel', () => {
  it('should map decibels onto [0, 1]', () => {
    expect(powerToLevel(0)).toBe(1);
    expect(powerToLevel(-20)).toBeCloseTo(0.1);
    expect(powerToLevel(-160)).toBeCloseTo(0);
    expect(powerToLevel(6)).toBe(1);
    expect(powerToLevel(Number.NaN)).toBe(0);
  });
});

describe('AudioLevelMeter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should sample on each tick and stop itself at the maximum duration', () => {
    const onLevel = vi.fn();
    const onAutoStop = vi.fn();
    const meter = new AudioLevelMeter(
      { averagePower: () => 0 },
      { intervalMs: 50, maxDurationMs: 200, onLevel, onAutoStop }
    );

    meter.start();
    vi.advanceTimersByTime(100);

    expect(onLevel.mock.calls).toEqual([
      [1, 50],
      [1, 100],
    ]);
    expect(meter.isRunning).toBe(true);
    expect(meter.level).toBe(1);

    vi.advanceTimersByTime(500);

    expect(onLevel).toHaveBeenCalledTimes(4);
    expect(onAutoStop).toHaveBeenCalledTimes(1);
    expect(meter.isRunning).toBe(false);
    expect(meter.elapsedMs).toBe(200);
  });

  it('should stop sampling when stopped', () => {
    const onLevel = vi.fn();
    const meter = new AudioLevelMeter({ averagePower: () => -20 }, { onLevel });

    meter.start();
    vi.advanceTimersByTime(50);
    meter.stop();
    vi.advanceTimersByTime(1000);

    expect(onLevel).toHaveBeenCalledTimes(1);
    expect(meter.isRunning).toBe(false);
  });

  it('should restart from zero', () => {
    const meter = new AudioLevelMeter({ averagePower: () => -20 }, { intervalMs: 50 });

    meter.start();
    vi.advanceTimersByTime(150);
    meter.stop();
    meter.start();

    expect(meter.elapsedMs).toBe(0);
    expect(meter.level).toBe(0);
    meter.stop();
  });

  it('should stop when the level source fails', () => {
    const meter = new AudioLevelMeter({
      averagePower: () => {
        throw new Error('recorder released');
      },
    });

    meter.start();
    vi.advanceTimersByTime(50);

    expect(meter.isRunning).toBe(false);
    expect(mockLogger.warn).toHaveBeenCalledWith('Level source failed, stopping meter', {
      error: 'recorder released',
    });
  });
});

describe('UnavailableVoiceTranscriber', () => {
  it('should always fail with a recognition error', async () => {
    await expect(new UnavailableVoiceTranscriber().transcribe('clip-1')).rejects.toMatchObject({
      code: 'RECOGNITION_FAILED',
      message: 'Speech recognition failed: speech recognition is not available on this host',
    });
  });
});
