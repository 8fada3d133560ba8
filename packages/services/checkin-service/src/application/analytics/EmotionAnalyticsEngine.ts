import type { EmotionKind } from '@moodlens/shared-contracts';
import type { CheckInRecord } from '../../domains/entities';
import {
  calculateEmotionFrequency,
  calculateEmotionStreak,
  calculateEmotionTrend,
  calculateTimeOfDayPatterns,
  filterByDateRange,
  getDominantEmotion,
} from './emotion-analytics';
import type {
  AnalyticsSummary,
  DateRange,
  EmotionFrequency,
  StreakAdjacency,
  StreakResult,
  TimeOfDayBucket,
  TrendPoint,
} from './types';

export interface EmotionAnalyticsEngineOptions {
  streakAdjacency?: StreakAdjacency;
}

/**
 * Injectable facade over the analytics functions, carrying the streak policy
 */
export class EmotionAnalyticsEngine {
  private readonly streakAdjacency: StreakAdjacency;

  constructor(options: EmotionAnalyticsEngineOptions = {}) {
    this.streakAdjacency = options.streakAdjacency ?? 'calendar';
  }

  frequency(records: readonly CheckInRecord[]): EmotionFrequency[] {
    return calculateEmotionFrequency(records);
  }

  dominantEmotion(records: readonly CheckInRecord[]): EmotionKind | null {
    return getDominantEmotion(records);
  }

  streak(records: readonly CheckInRecord[]): StreakResult | null {
    return calculateEmotionStreak(records, { adjacency: this.streakAdjacency });
  }

  trend(records: readonly CheckInRecord[], range?: DateRange): TrendPoint[] {
    return calculateEmotionTrend(records, range);
  }

  timeOfDay(records: readonly CheckInRecord[]): TimeOfDayBucket[] {
    return calculateTimeOfDayPatterns(records);
  }

  filter(records: readonly CheckInRecord[], range: DateRange): CheckInRecord[] {
    return filterByDateRange(records, range.from, range.to);
  }

  summarize(records: readonly CheckInRecord[]): AnalyticsSummary {
    return {
      total: records.length,
      frequency: this.frequency(records),
      dominant: this.dominantEmotion(records),
      streak: this.streak(records),
    };
  }
}
