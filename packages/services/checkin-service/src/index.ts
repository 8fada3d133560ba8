/**
 * MoodLens check-in core
 *
 * Check-in orchestration, emotion analytics, insight generation and the
 * record store behind them.
 */

export * from './domains/entities';
export type { ICheckInRepository } from './domains/repositories';
export { noopFeedback } from './domains/ports';
export type {
  ICheckInFeedback,
  IEmotionClassifier,
  IImagePreparer,
  IVoiceTranscriber,
  ClassifierCallOptions,
  ClassifyDescriptionRequest,
  ClassifyImageRequest,
  ImagePreparationOptions,
  PreparedImage,
  VoiceTranscription,
} from './domains/ports';

export * from './application/errors';
export * from './application/checkin/CheckInOrchestrator';
export * from './application/analytics';
export * from './application/insights/GenerateInsightsUseCase';
export * from './application/timeline/TimelineService';

export { GeminiEmotionClassifier, GENERATION_CONFIG, type GeminiClassifierConfig } from './infrastructure/classifiers/GeminiEmotionClassifier';
export { MockEmotionClassifier, type MockEmotionClassifierOptions } from './infrastructure/classifiers/MockEmotionClassifier';
export { extractJson } from './infrastructure/classifiers/response-parsing';
export { DrizzleCheckInRepository } from './infrastructure/repositories/DrizzleCheckInRepository';
export { InMemoryCheckInRepository } from './infrastructure/repositories/InMemoryCheckInRepository';
export { createDatabaseConnection, IN_MEMORY_DATA_DIR, type DatabaseHandle } from './infrastructure/database/DatabaseConnectionFactory';
export { ImagePreparationService, type ImagePreparationConfig } from './infrastructure/services/ImagePreparationService';
export { AudioLevelMeter, powerToLevel, type LevelSource, type AudioLevelMeterOptions } from './infrastructure/audio/AudioLevelMeter';
export { describeVoiceTone, describeSamples, computeRms } from './infrastructure/audio/voice-tone';
export { UnavailableVoiceTranscriber } from './infrastructure/audio/UnavailableVoiceTranscriber';
export { ServiceFactory, type CheckInServiceRegistry, type ServiceOverrides } from './infrastructure/composition/ServiceFactory';
export { bootstrapCheckInService, type BootstrapOptions } from './bootstrap';
export { loadCheckInConfig, CHECKIN_ENV_VARS, type CheckInConfig } from './config/service-config';
