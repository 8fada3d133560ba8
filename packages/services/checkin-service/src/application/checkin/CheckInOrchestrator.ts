/**
 * Check-In Orchestrator
 *
 * Drives one check-in from capture to a persisted record:
 * photo, optional voice clip, notes, then classification and save.
 * One instance handles one session at a time; callers reset() between sessions.
 */

import {
  errorMessage,
  generateCorrelationId,
  getCorrelationContext,
  runWithContext,
  serializeError,
} from '@moodlens/platform-core';
import { getLogger } from '../../config/service-config';
import type { CheckInRecord, CheckInStep, EmotionAnalysis } from '../../domains/entities';
import type { ICheckInRepository } from '../../domains/repositories';
import {
  noopFeedback,
  type ICheckInFeedback,
  type IEmotionClassifier,
  type IImagePreparer,
  type IVoiceTranscriber,
} from '../../domains/ports';
import { CheckInError, ClassifierError, StorageError } from '../errors';

const logger = getLogger('checkin-orchestrator');

export const DEFAULT_MAX_IMAGE_BYTES = 500 * 1024;

export interface CheckInOrchestratorDependencies {
  classifier: IEmotionClassifier;
  repository: ICheckInRepository;
  transcriber: IVoiceTranscriber;
  imagePreparer: IImagePreparer;
  feedback?: ICheckInFeedback;
}

export interface CheckInOrchestratorOptions {
  maxImageBytes?: number;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

export interface CheckInResult {
  analysis: EmotionAnalysis;
  record: CheckInRecord;
}

export interface CheckInSnapshot {
  readonly step: CheckInStep;
  readonly hasPhoto: boolean;
  readonly voiceClip: string | null;
  readonly voiceSkipped: boolean;
  readonly notes: string;
  readonly analysis: EmotionAnalysis | null;
  readonly record: CheckInRecord | null;
  readonly error: Error | null;
  readonly voiceEnrichmentError: Error | null;
  readonly hasPendingAnalysis: boolean;
}

interface VoiceEvidence {
  voiceTone: string | null;
  transcript: string | null;
}

const NO_VOICE: VoiceEvidence = { voiceTone: null, transcript: null };

export class CheckInOrchestrator {
  private readonly classifier: IEmotionClassifier;
  private readonly repository: ICheckInRepository;
  private readonly transcriber: IVoiceTranscriber;
  private readonly imagePreparer: IImagePreparer;
  private readonly feedback: ICheckInFeedback;
  private readonly maxImageBytes: number;

  private step: CheckInStep = 'awaitingPhoto';
  private photo: Buffer | null = null;
  private voiceClip: string | null = null;
  private voiceSkipped = false;
  private notes = '';
  private analysis: EmotionAnalysis | null = null;
  private record: CheckInRecord | null = null;
  private error: Error | null = null;
  private voiceEnrichmentError: Error | null = null;
  private pendingAnalysis: EmotionAnalysis | null = null;

  constructor(dependencies: CheckInOrchestratorDependencies, options: CheckInOrchestratorOptions = {}) {
    this.classifier = dependencies.classifier;
    this.repository = dependencies.repository;
    this.transcriber = dependencies.transcriber;
    this.imagePreparer = dependencies.imagePreparer;
    this.feedback = dependencies.feedback ?? noopFeedback;
    this.maxImageBytes = options.maxImageBytes ?? DEFAULT_MAX_IMAGE_BYTES;
  }

  get currentStep(): CheckInStep {
    return this.step;
  }

  getSnapshot(): CheckInSnapshot {
    return Object.freeze({
      step: this.step,
      hasPhoto: this.photo !== null,
      voiceClip: this.voiceClip,
      voiceSkipped: this.voiceSkipped,
      notes: this.notes,
      analysis: this.analysis,
      record: this.record,
      error: this.error,
      voiceEnrichmentError: this.voiceEnrichmentError,
      hasPendingAnalysis: this.pendingAnalysis !== null,
    });
  }

  submitPhoto(image: Buffer | null | undefined): void {
    this.assertStep('submit a photo', 'awaitingPhoto');
    if (!image || image.length === 0) {
      throw CheckInError.missingPhoto();
    }
    this.photo = image;
    this.error = null;
    this.pendingAnalysis = null;
    this.transition('awaitingVoice');
  }

  submitVoice(clipReference: string): void {
    this.assertStep('submit a voice clip', 'awaitingVoice');
    this.voiceClip = clipReference;
    this.voiceSkipped = false;
    this.pendingAnalysis = null;
    this.transition('awaitingNotes');
  }

  skipVoice(): void {
    this.assertStep('skip voice', 'awaitingVoice');
    this.voiceClip = null;
    this.voiceSkipped = true;
    this.pendingAnalysis = null;
    this.transition('awaitingNotes');
  }

  setNotes(text: string): void {
    if (this.step === 'classifying' || this.step === 'done') {
      throw CheckInError.invalidTransition('edit notes', this.step);
    }
    this.notes = text;
  }

  async submit(options: SubmitOptions = {}): Promise<CheckInResult> {
    if (this.step === 'classifying' || this.step === 'done') {
      throw CheckInError.invalidTransition('submit', this.step);
    }
    return runWithContext({ correlationId: generateCorrelationId() }, () => this.runSubmit(options));
  }

  /**
   * Persist the analysis kept from a failed save without classifying again
   */
  async retrySave(): Promise<CheckInResult> {
    const pending = this.pendingAnalysis;
    if (this.step !== 'awaitingNotes' || !pending) {
      throw CheckInError.invalidTransition('retry save', this.step);
    }
    this.error = null;
    this.transition('classifying');
    return runWithContext({ correlationId: generateCorrelationId() }, () => this.persist(pending));
  }

  reset(): void {
    this.photo = null;
    this.voiceClip = null;
    this.voiceSkipped = false;
    this.notes = '';
    this.analysis = null;
    this.record = null;
    this.error = null;
    this.voiceEnrichmentError = null;
    this.pendingAnalysis = null;
    this.transition('awaitingPhoto');
  }

  /**
   * Step back one capture step, discarding what the step being left captured.
   * An analysis kept from a failed save no longer matches the capture and is dropped too.
   */
  goBack(): void {
    switch (this.step) {
      case 'awaitingVoice':
        this.photo = null;
        this.pendingAnalysis = null;
        this.transition('awaitingPhoto');
        break;
      case 'awaitingNotes':
        this.voiceClip = null;
        this.voiceSkipped = false;
        this.pendingAnalysis = null;
        this.transition('awaitingVoice');
        break;
      default:
        break;
    }
  }

  private async runSubmit(options: SubmitOptions): Promise<CheckInResult> {
    const photo = this.photo;
    if (!photo) {
      const error = CheckInError.missingPhoto();
      this.error = error;
      this.transition('awaitingPhoto');
      this.feedback.failure();
      throw error;
    }

    this.error = null;
    this.voiceEnrichmentError = null;
    this.pendingAnalysis = null;
    this.transition('classifying');

    const voice = await this.transcribeVoice();

    let image: Buffer;
    try {
      const prepared = await this.imagePreparer.prepare(photo, { maxBytes: this.maxImageBytes });
      image = prepared.data;
      logger.debug('Photo prepared for upload', {
        width: prepared.width,
        height: prepared.height,
        quality: prepared.quality,
        byteLength: prepared.byteLength,
        withinLimit: prepared.withinLimit,
      });
    } catch (error) {
      throw this.fail(
        error instanceof CheckInError
          ? error
          : CheckInError.imagePreparationFailed(errorMessage(error), error instanceof Error ? error : undefined)
      );
    }

    let analysis: EmotionAnalysis;
    try {
      analysis = await this.classifier.classifyImage({
        image,
        voiceTone: voice.voiceTone,
        transcript: voice.transcript,
        signal: options.signal,
      });
    } catch (error) {
      throw this.fail(
        error instanceof ClassifierError
          ? error
          : ClassifierError.apiError(errorMessage(error), error instanceof Error ? error : undefined)
      );
    }

    return this.persist(analysis);
  }

  private async transcribeVoice(): Promise<VoiceEvidence> {
    if (!this.voiceClip) return NO_VOICE;

    try {
      const transcription = await this.transcriber.transcribe(this.voiceClip);
      return {
        voiceTone: transcription.toneDescriptor || null,
        transcript: transcription.text.trim() ? transcription.text : null,
      };
    } catch (error) {
      this.voiceEnrichmentError = error instanceof Error ? error : new Error(errorMessage(error));
      logger.warn('Voice transcription failed, continuing without voice', { error: serializeError(error) });
      return NO_VOICE;
    }
  }

  private async persist(analysis: EmotionAnalysis): Promise<CheckInResult> {
    const context = getCorrelationContext();
    if (context) context.checkInId = analysis.id;

    let record: CheckInRecord;
    try {
      record = await this.repository.save(analysis, this.notes);
    } catch (error) {
      this.pendingAnalysis = analysis;
      throw this.fail(
        error instanceof StorageError
          ? error
          : StorageError.saveFailed(errorMessage(error), error instanceof Error ? error : undefined)
      );
    }

    this.pendingAnalysis = null;
    this.analysis = analysis;
    this.record = record;
    this.transition('done');
    this.feedback.success();

    logger.info('Check-in recorded', {
      checkInId: record.id,
      primaryEmotion: analysis.primaryEmotion,
      scoreCount: analysis.scores.length,
      hasVoice: analysis.voiceTranscript !== null,
    });

    return { analysis, record };
  }

  private fail<E extends Error>(error: E): E {
    this.error = error;
    this.transition('awaitingNotes');
    this.feedback.failure();
    logger.warn('Check-in attempt failed', { error: serializeError(error) });
    return error;
  }

  private assertStep(action: string, expected: CheckInStep): void {
    if (this.step !== expected) {
      throw CheckInError.invalidTransition(action, this.step);
    }
  }

  private transition(next: CheckInStep): void {
    if (this.step === next) return;
    this.step = next;
    this.feedback.stepChanged(next);
  }
}
