import type { EmotionKind } from '@moodlens/shared-contracts';
import { generateCorrelationId, runWithContext, serializeError } from '@moodlens/platform-core';
import { getLogger } from '../../config/service-config';
import type { CheckInRecord } from '../../domains/entities';
import type { ICheckInRepository } from '../../domains/repositories';
import type { ClassifierCallOptions, IEmotionClassifier } from '../../domains/ports';
import { EmotionAnalyticsEngine } from '../analytics/EmotionAnalyticsEngine';
import { subtractDays } from '../analytics/calendar';
import type { StreakResult } from '../analytics/types';

const logger = getLogger('generate-insights');

export interface GenerateInsightsDependencies {
  repository: ICheckInRepository;
  classifier: IEmotionClassifier;
  analytics?: EmotionAnalyticsEngine;
  clock?: () => Date;
}

export interface GenerateInsightsOptions {
  windowDays?: number;
  maxEntries?: number;
}

export interface InsightsResult {
  insights: string[];
  dominantEmotion: EmotionKind | null;
  streak: StreakResult | null;
  recordCount: number;
  generatedAt: Date;
}

// "- 2024-03-01T09:15: happy", UTC to the minute
export function formatSummaryLine(record: Pick<CheckInRecord, 'timestamp' | 'primaryEmotion'>): string {
  return `- ${record.timestamp.toISOString().slice(0, 16)}: ${record.primaryEmotion}`;
}

export function buildSummaryLines(records: readonly CheckInRecord[], maxEntries: number): string[] {
  return [...records]
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .slice(0, maxEntries)
    .map(formatSummaryLine);
}

export class GenerateInsightsUseCase {
  private readonly repository: ICheckInRepository;
  private readonly classifier: IEmotionClassifier;
  private readonly analytics: EmotionAnalyticsEngine;
  private readonly clock: () => Date;
  private readonly windowDays: number;
  private readonly maxEntries: number;

  private loading = false;
  private _lastError: Error | null = null;

  constructor(dependencies: GenerateInsightsDependencies, options: GenerateInsightsOptions = {}) {
    this.repository = dependencies.repository;
    this.classifier = dependencies.classifier;
    this.analytics = dependencies.analytics ?? new EmotionAnalyticsEngine();
    this.clock = dependencies.clock ?? (() => new Date());
    this.windowDays = options.windowDays ?? 30;
    this.maxEntries = options.maxEntries ?? 30;
  }

  isLoading(): boolean {
    return this.loading;
  }

  get lastError(): Error | null {
    return this._lastError;
  }

  async execute(options: ClassifierCallOptions = {}): Promise<InsightsResult> {
    return runWithContext({ correlationId: generateCorrelationId() }, () => this.generate(options));
  }

  private async generate(options: ClassifierCallOptions): Promise<InsightsResult> {
    this.loading = true;
    this._lastError = null;

    try {
      const now = this.clock();
      const records = await this.repository.fetch(subtractDays(now, this.windowDays), now);

      if (records.length === 0) {
        logger.debug('No check-ins in window, skipping insight generation', { windowDays: this.windowDays });
        return { insights: [], dominantEmotion: null, streak: null, recordCount: 0, generatedAt: now };
      }

      const dominantEmotion = this.analytics.dominantEmotion(records);
      const streak = this.analytics.streak(records);
      const summaryLines = buildSummaryLines(records, this.maxEntries);

      const insights = await this.classifier.generateInsights(summaryLines, { signal: options.signal });

      logger.info('Insights generated', {
        recordCount: records.length,
        summarized: summaryLines.length,
        insightCount: insights.length,
        dominantEmotion,
      });

      return { insights, dominantEmotion, streak, recordCount: records.length, generatedAt: now };
    } catch (error) {
      this._lastError = error instanceof Error ? error : new Error(String(error));
      logger.warn('Insight generation failed', { error: serializeError(error) });
      throw error;
    } finally {
      this.loading = false;
    }
  }
}
