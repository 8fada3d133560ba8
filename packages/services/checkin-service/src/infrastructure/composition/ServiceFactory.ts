/**
 * Service Factory - Composition Root
 * Builds the production object graph; every collaborator can be replaced for tests.
 */

import { isProduction } from '@moodlens/platform-core';
import { getLogger, loadCheckInConfig, type CheckInConfig } from '../../config/service-config';
import type { ICheckInRepository } from '../../domains/repositories';
import type { ICheckInFeedback, IEmotionClassifier, IImagePreparer, IVoiceTranscriber } from '../../domains/ports';
import { CheckInOrchestrator } from '../../application/checkin/CheckInOrchestrator';
import { EmotionAnalyticsEngine } from '../../application/analytics/EmotionAnalyticsEngine';
import type { StreakAdjacency } from '../../application/analytics/types';
import { GenerateInsightsUseCase } from '../../application/insights/GenerateInsightsUseCase';
import { TimelineService } from '../../application/timeline/TimelineService';
import { ClassifierError } from '../../application/errors';
import { GeminiEmotionClassifier } from '../classifiers/GeminiEmotionClassifier';
import { MockEmotionClassifier } from '../classifiers/MockEmotionClassifier';
import { createDatabaseConnection, type DatabaseHandle } from '../database/DatabaseConnectionFactory';
import { DrizzleCheckInRepository } from '../repositories/DrizzleCheckInRepository';
import { ImagePreparationService } from '../services/ImagePreparationService';
import { UnavailableVoiceTranscriber } from '../audio/UnavailableVoiceTranscriber';

const logger = getLogger('checkin-service-factory');

export interface ServiceOverrides {
  classifier?: IEmotionClassifier;
  repository?: ICheckInRepository;
  transcriber?: IVoiceTranscriber;
  imagePreparer?: IImagePreparer;
  clock?: () => Date;
  streakAdjacency?: StreakAdjacency;
  env?: NodeJS.ProcessEnv;
}

export interface CheckInServiceRegistry {
  config: CheckInConfig;
  database: DatabaseHandle | null;
  repository: ICheckInRepository;
  classifier: IEmotionClassifier;
  transcriber: IVoiceTranscriber;
  imagePreparer: IImagePreparer;
  analytics: EmotionAnalyticsEngine;
  timeline: TimelineService;
  insights: GenerateInsightsUseCase;
  createOrchestrator(feedback?: ICheckInFeedback): CheckInOrchestrator;
  close(): Promise<void>;
}

export class ServiceFactory {
  /**
   * Without an API key the offline classifier is used, except in production
   * where a missing key is a startup error.
   */
  static createClassifier(config: CheckInConfig, env: NodeJS.ProcessEnv = process.env): IEmotionClassifier {
    const { apiKey, model, baseUrl, timeoutMs } = config.gemini;
    if (apiKey) {
      return new GeminiEmotionClassifier({ apiKey, model, baseUrl, timeoutMs });
    }
    if (isProduction(env)) {
      throw ClassifierError.invalidApiKey();
    }
    logger.warn('GEMINI_API_KEY not set, using offline mock classifier');
    return new MockEmotionClassifier();
  }

  static async create(
    config: CheckInConfig = loadCheckInConfig(),
    overrides: ServiceOverrides = {}
  ): Promise<CheckInServiceRegistry> {
    const classifier = overrides.classifier ?? ServiceFactory.createClassifier(config, overrides.env);

    let database: DatabaseHandle | null = null;
    let repository = overrides.repository;
    if (!repository) {
      database = await createDatabaseConnection(config.database.dataDir);
      repository = new DrizzleCheckInRepository(database.db);
    }
    const store = repository;

    const transcriber = overrides.transcriber ?? new UnavailableVoiceTranscriber();
    const imagePreparer =
      overrides.imagePreparer ??
      new ImagePreparationService({ maxDimension: config.image.maxDimension, maxBytes: config.image.maxBytes });
    const analytics = new EmotionAnalyticsEngine({ streakAdjacency: overrides.streakAdjacency });
    const timeline = new TimelineService(store);
    const insights = new GenerateInsightsUseCase(
      { repository: store, classifier, analytics, clock: overrides.clock },
      { windowDays: config.insights.windowDays, maxEntries: config.insights.maxEntries }
    );

    logger.debug('Check-in services wired', {
      classifier: classifier.constructor.name,
      persistent: database !== null,
    });

    return {
      config,
      database,
      repository: store,
      classifier,
      transcriber,
      imagePreparer,
      analytics,
      timeline,
      insights,
      createOrchestrator: (feedback?: ICheckInFeedback) =>
        new CheckInOrchestrator(
          { classifier, repository: store, transcriber, imagePreparer, feedback },
          { maxImageBytes: config.image.maxBytes }
        ),
      close: async () => {
        await database?.close();
      },
    };
  }
}
