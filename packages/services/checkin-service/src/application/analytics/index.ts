export * from './emotion-analytics';
export * from './calendar';
export { EmotionAnalyticsEngine, type EmotionAnalyticsEngineOptions } from './EmotionAnalyticsEngine';
export type {
  AnalyticsSummary,
  DateRange,
  EmotionFrequency,
  StreakAdjacency,
  StreakOptions,
  StreakResult,
  TimeOfDayBucket,
  TrendPoint,
} from './types';
