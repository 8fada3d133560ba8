import { describe, it, expect } from 'vitest';
import {
  calculateEmotionFrequency,
  calculateEmotionStreak,
  calculateEmotionTrend,
  calculateTimeOfDayPatterns,
  filterByDateRange,
  getDominantEmotion,
} from '../../application/analytics/emotion-analytics';
import { EmotionAnalyticsEngine } from '../../application/analytics/EmotionAnalyticsEngine';
import { localDayKey, localDayNumber, startOfLocalDay, subtractDays } from '../../application/analytics/calendar';
import { atLocal, createDailyRecords, createMockCheckInRecord, serializeScores } from '@moodlens/test-utils';

function recordsOf(...emotions: string[]) {
  return emotions.map((primaryEmotion, index) =>
    createMockCheckInRecord({ primaryEmotion, timestamp: atLocal(2024, 3, 1, 8 + index) })
  );
}

describe('calendar helpers', () => {
  it('should key days by local date', () => {
    expect(localDayKey(atLocal(2024, 3, 9, 23, 59))).toBe('2024-03-09');
    expect(startOfLocalDay(atLocal(2024, 3, 9, 23, 59))).toEqual(atLocal(2024, 3, 9, 0, 0));
  });

  it('should number consecutive local days consecutively', () => {
    expect(localDayNumber(atLocal(2024, 3, 11, 0, 30)) - localDayNumber(atLocal(2024, 3, 10, 23, 30))).toBe(1);
  });

  it('should step back whole calendar days and keep the wall-clock time', () => {
    expect(subtractDays(atLocal(2024, 3, 31, 12), 30)).toEqual(atLocal(2024, 3, 1, 12));
    expect(subtractDays(atLocal(2024, 11, 15, 9, 45), 30)).toEqual(atLocal(2024, 10, 16, 9, 45));
    expect(subtractDays(atLocal(2024, 3, 1, 8), 1)).toEqual(atLocal(2024, 2, 29, 8));
  });
});

describe('calculateEmotionFrequency', () => {
  it('should rank by count then enumeration order', () => {
    const frequency = calculateEmotionFrequency(recordsOf('happy', 'happy', 'anxious', 'sad'));

    expect(frequency).toEqual([
      { emotion: 'happy', count: 2, percentage: 50 },
      { emotion: 'sad', count: 1, percentage: 25 },
      { emotion: 'anxious', count: 1, percentage: 25 },
    ]);
  });

  it('should skip unknown emotions but keep them in the total', () => {
    expect(calculateEmotionFrequency(recordsOf('happy', 'bored'))).toEqual([
      { emotion: 'happy', count: 1, percentage: 50 },
    ]);
  });

  it('should return an empty list for no records', () => {
    expect(calculateEmotionFrequency([])).toEqual([]);
  });
});

describe('getDominantEmotion', () => {
  it('should pick the most frequent emotion', () => {
    expect(getDominantEmotion(recordsOf('anxious', 'happy', 'anxious'))).toBe('anxious');
  });

  it('should break ties by enumeration order', () => {
    expect(getDominantEmotion(recordsOf('calm', 'sad'))).toBe('sad');
  });

  it('should return null without recognised emotions', () => {
    expect(getDominantEmotion([])).toBeNull();
    expect(getDominantEmotion(recordsOf('bored'))).toBeNull();
  });
});

describe('calculateEmotionStreak', () => {
  it('should find the longest run of consecutive days', () => {
    const records = createDailyRecords(atLocal(2024, 3, 1), ['happy', 'happy', 'happy', 'sad']);
    expect(calculateEmotionStreak(records)).toEqual({ emotion: 'happy', days: 3 });
  });

  it('should break calendar runs on days without data', () => {
    const records = [
      ...createDailyRecords(atLocal(2024, 3, 1), ['calm', 'calm']),
      ...createDailyRecords(atLocal(2024, 3, 4), ['calm', 'calm']),
    ];

    expect(calculateEmotionStreak(records)).toEqual({ emotion: 'calm', days: 2 });
    expect(calculateEmotionStreak(records, { adjacency: 'sequential' })).toEqual({ emotion: 'calm', days: 4 });
  });

  it('should use the majority emotion of each day', () => {
    const records = [
      createMockCheckInRecord({ primaryEmotion: 'sad', timestamp: atLocal(2024, 3, 1, 8) }),
      createMockCheckInRecord({ primaryEmotion: 'happy', timestamp: atLocal(2024, 3, 1, 12) }),
      createMockCheckInRecord({ primaryEmotion: 'happy', timestamp: atLocal(2024, 3, 1, 20) }),
      createMockCheckInRecord({ primaryEmotion: 'happy', timestamp: atLocal(2024, 3, 2, 9) }),
    ];
    expect(calculateEmotionStreak(records)).toEqual({ emotion: 'happy', days: 2 });
  });

  it('should keep the earliest of equally long runs', () => {
    const records = createDailyRecords(atLocal(2024, 3, 1), ['sad', 'sad', 'happy', 'happy']);
    expect(calculateEmotionStreak(records)).toEqual({ emotion: 'sad', days: 2 });
  });

  it('should be independent of input order', () => {
    const records = createDailyRecords(atLocal(2024, 3, 1), ['happy', 'happy', 'sad']).reverse();
    expect(calculateEmotionStreak(records)).toEqual({ emotion: 'happy', days: 2 });
  });

  it('should return null for no records', () => {
    expect(calculateEmotionStreak([])).toBeNull();
  });
});

describe('calculateEmotionTrend', () => {
  it('should average confidence per day and emotion', () => {
    const records = [
      createMockCheckInRecord({ primaryEmotion: 'happy', confidence: 0.6, timestamp: atLocal(2024, 3, 2, 9) }),
      createMockCheckInRecord({ primaryEmotion: 'happy', confidence: 0.8, timestamp: atLocal(2024, 3, 2, 18) }),
      createMockCheckInRecord({ primaryEmotion: 'calm', confidence: 0.5, timestamp: atLocal(2024, 3, 1, 10) }),
    ];

    const trend = calculateEmotionTrend(records);

    expect(trend).toHaveLength(2);
    expect(trend[0]).toEqual({ date: atLocal(2024, 3, 1, 0), emotion: 'calm', averageConfidence: 0.5 });
    expect(trend[1]?.date).toEqual(atLocal(2024, 3, 2, 0));
    expect(trend[1]?.emotion).toBe('happy');
    expect(trend[1]?.averageConfidence).toBeCloseTo(0.7);
  });

  it('should count a missing primary score as zero confidence', () => {
    const records = [
      createMockCheckInRecord({
        primaryEmotion: 'sad',
        serializedScores: serializeScores([{ emotion: 'happy', confidence: 0.9 }]),
        timestamp: atLocal(2024, 3, 1, 9),
      }),
      createMockCheckInRecord({ primaryEmotion: 'sad', confidence: 0.6, timestamp: atLocal(2024, 3, 1, 21) }),
    ];

    expect(calculateEmotionTrend(records)).toEqual([
      { date: atLocal(2024, 3, 1, 0), emotion: 'sad', averageConfidence: 0.3 },
    ]);
  });

  it('should order same-day points by enumeration order', () => {
    const records = [
      createMockCheckInRecord({ primaryEmotion: 'calm', timestamp: atLocal(2024, 3, 1, 9) }),
      createMockCheckInRecord({ primaryEmotion: 'angry', timestamp: atLocal(2024, 3, 1, 10) }),
    ];
    expect(calculateEmotionTrend(records).map(point => point.emotion)).toEqual(['angry', 'calm']);
  });

  it('should limit points to the given range', () => {
    const records = createDailyRecords(atLocal(2024, 3, 1), ['happy', 'sad', 'calm']);
    const trend = calculateEmotionTrend(records, { from: atLocal(2024, 3, 2, 0), to: atLocal(2024, 3, 2, 23, 59) });
    expect(trend.map(point => point.emotion)).toEqual(['sad']);
  });
});

describe('calculateTimeOfDayPatterns', () => {
  it('should count emotions per local hour', () => {
    const records = [
      createMockCheckInRecord({ primaryEmotion: 'sad', timestamp: atLocal(2024, 3, 1, 21) }),
      createMockCheckInRecord({ primaryEmotion: 'happy', timestamp: atLocal(2024, 3, 1, 9, 5) }),
      createMockCheckInRecord({ primaryEmotion: 'calm', timestamp: atLocal(2024, 3, 2, 9, 40) }),
      createMockCheckInRecord({ primaryEmotion: 'happy', timestamp: atLocal(2024, 3, 3, 9, 15) }),
    ];

    expect(calculateTimeOfDayPatterns(records)).toEqual([
      { hour: 9, emotion: 'happy', count: 2 },
      { hour: 9, emotion: 'calm', count: 1 },
      { hour: 21, emotion: 'sad', count: 1 },
    ]);
  });
});

describe('filterByDateRange', () => {
  it('should include both bounds', () => {
    const records = createDailyRecords(atLocal(2024, 3, 1), ['happy', 'sad', 'calm']);
    const filtered = filterByDateRange(records, atLocal(2024, 3, 1, 12), atLocal(2024, 3, 2, 12));
    expect(filtered.map(record => record.primaryEmotion)).toEqual(['happy', 'sad']);
  });
});

describe('EmotionAnalyticsEngine', () => {
  const records = [
    ...createDailyRecords(atLocal(2024, 3, 1), ['happy', 'happy']),
    ...createDailyRecords(atLocal(2024, 3, 5), ['happy', 'sad']),
  ];

  it('should default to calendar adjacency', () => {
    expect(new EmotionAnalyticsEngine().streak(records)).toEqual({ emotion: 'happy', days: 2 });
  });

  it('should honour a sequential streak policy', () => {
    const engine = new EmotionAnalyticsEngine({ streakAdjacency: 'sequential' });
    expect(engine.streak(records)).toEqual({ emotion: 'happy', days: 3 });
  });

  it('should summarise records', () => {
    const summary = new EmotionAnalyticsEngine().summarize(records);

    expect(summary.total).toBe(4);
    expect(summary.dominant).toBe('happy');
    expect(summary.frequency).toEqual([
      { emotion: 'happy', count: 3, percentage: 75 },
      { emotion: 'sad', count: 1, percentage: 25 },
    ]);
    expect(summary.streak).toEqual({ emotion: 'happy', days: 2 });
  });
});
