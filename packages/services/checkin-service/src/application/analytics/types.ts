import type { EmotionKind } from '@moodlens/shared-contracts';

export interface DateRange {
  from: Date;
  to: Date;
}

export interface EmotionFrequency {
  emotion: EmotionKind;
  count: number;
  /** 0-100, share of all records including ones with unrecognised emotions */
  percentage: number;
}

export interface TrendPoint {
  /** Local midnight of the day */
  date: Date;
  emotion: EmotionKind;
  averageConfidence: number;
}

export interface TimeOfDayBucket {
  hour: number;
  emotion: EmotionKind;
  count: number;
}

export interface StreakResult {
  emotion: EmotionKind;
  days: number;
}

/**
 * calendar: runs break on any day without data.
 * sequential: consecutive days that have data count as adjacent.
 */
export type StreakAdjacency = 'calendar' | 'sequential';

export interface StreakOptions {
  adjacency?: StreakAdjacency;
}

export interface AnalyticsSummary {
  total: number;
  frequency: EmotionFrequency[];
  dominant: EmotionKind | null;
  streak: StreakResult | null;
}
