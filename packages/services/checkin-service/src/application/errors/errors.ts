import { DomainErrorCode, createDomainServiceError } from '@moodlens/platform-core';
import type { CheckInStep } from '../../domains/entities/CheckInStep';

const CheckInDomainCodes = {
  MISSING_PHOTO: 'MISSING_PHOTO',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  IMAGE_PREPARATION_FAILED: 'IMAGE_PREPARATION_FAILED',
} as const;

export const CheckInErrorCode = { ...DomainErrorCode, ...CheckInDomainCodes } as const;
export type CheckInErrorCodeType = (typeof CheckInErrorCode)[keyof typeof CheckInErrorCode];

const CheckInErrorBase = createDomainServiceError('CheckIn', CheckInErrorCode);

export class CheckInError extends CheckInErrorBase {
  static missingPhoto() {
    return new CheckInError('No photo captured for this check-in', 400, CheckInErrorCode.MISSING_PHOTO);
  }

  static invalidTransition(action: string, step: CheckInStep) {
    return new CheckInError(`Cannot ${action} while ${step}`, 409, CheckInErrorCode.INVALID_TRANSITION, undefined, {
      action,
      step,
    });
  }

  static imagePreparationFailed(reason: string, cause?: Error) {
    return new CheckInError(
      `Image preparation failed: ${reason}`,
      422,
      CheckInErrorCode.IMAGE_PREPARATION_FAILED,
      cause
    );
  }
}

const ClassifierDomainCodes = {
  INVALID_API_KEY: 'INVALID_API_KEY',
  RATE_LIMITED: 'RATE_LIMITED',
  API_ERROR: 'API_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR',
  DECODE_ERROR: 'DECODE_ERROR',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  CANCELLED: 'CANCELLED',
} as const;

export const ClassifierErrorCode = { ...DomainErrorCode, ...ClassifierDomainCodes } as const;
export type ClassifierErrorCodeType = (typeof ClassifierErrorCode)[keyof typeof ClassifierErrorCode];

export type ClassifierErrorCategory = 'auth' | 'rate-limit' | 'api' | 'network' | 'decode' | 'cancelled';

const ClassifierErrorBase = createDomainServiceError('Classifier', ClassifierErrorCode);

export class ClassifierError extends ClassifierErrorBase {
  get category(): ClassifierErrorCategory {
    switch (this.code) {
      case ClassifierErrorCode.INVALID_API_KEY:
        return 'auth';
      case ClassifierErrorCode.RATE_LIMITED:
        return 'rate-limit';
      case ClassifierErrorCode.NETWORK_ERROR:
      case ClassifierErrorCode.TIMEOUT:
        return 'network';
      case ClassifierErrorCode.DECODE_ERROR:
      case ClassifierErrorCode.INVALID_RESPONSE:
        return 'decode';
      case ClassifierErrorCode.CANCELLED:
        return 'cancelled';
      default:
        return 'api';
    }
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), category: this.category };
  }

  static invalidApiKey() {
    return new ClassifierError('Invalid or missing Gemini API key', 401, ClassifierErrorCode.INVALID_API_KEY);
  }

  static rateLimited() {
    return new ClassifierError(
      'API rate limit exceeded. Please try again later.',
      429,
      ClassifierErrorCode.RATE_LIMITED
    );
  }

  static apiError(message: string, cause?: Error, httpStatus?: number) {
    return new ClassifierError(
      `Gemini API error: ${message}`,
      502,
      ClassifierErrorCode.API_ERROR,
      cause,
      httpStatus === undefined ? undefined : { httpStatus }
    );
  }

  static networkError(cause: Error) {
    return new ClassifierError(`Network error: ${cause.message}`, 503, ClassifierErrorCode.NETWORK_ERROR, cause);
  }

  static decodeError(cause: Error) {
    return new ClassifierError(
      `Failed to decode response: ${cause.message}`,
      502,
      ClassifierErrorCode.DECODE_ERROR,
      cause
    );
  }

  static invalidResponse(reason: string) {
    return new ClassifierError(
      `Invalid response from Gemini API: ${reason}`,
      502,
      ClassifierErrorCode.INVALID_RESPONSE
    );
  }

  static cancelled(cause?: Error) {
    return new ClassifierError('Classifier request was cancelled', 499, ClassifierErrorCode.CANCELLED, cause);
  }
}

const StorageDomainCodes = {
  SAVE_FAILED: 'SAVE_FAILED',
  FETCH_FAILED: 'FETCH_FAILED',
  DELETE_FAILED: 'DELETE_FAILED',
} as const;

export const StorageErrorCode = { ...DomainErrorCode, ...StorageDomainCodes } as const;
export type StorageErrorCodeType = (typeof StorageErrorCode)[keyof typeof StorageErrorCode];

const StorageErrorBase = createDomainServiceError('Storage', StorageErrorCode);

export class StorageError extends StorageErrorBase {
  static override notFound(resource: string, id?: string) {
    const message = id ? `${resource} not found: ${id}` : `${resource} not found`;
    return new StorageError(message, 404, StorageErrorCode.NOT_FOUND);
  }

  static saveFailed(reason: string, cause?: Error) {
    return new StorageError(`Failed to save check-in: ${reason}`, 500, StorageErrorCode.SAVE_FAILED, cause);
  }

  static fetchFailed(reason: string, cause?: Error) {
    return new StorageError(`Failed to fetch check-ins: ${reason}`, 500, StorageErrorCode.FETCH_FAILED, cause);
  }

  static deleteFailed(reason: string, cause?: Error) {
    return new StorageError(`Failed to delete check-in: ${reason}`, 500, StorageErrorCode.DELETE_FAILED, cause);
  }
}

const TranscriptionDomainCodes = {
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  RECOGNITION_FAILED: 'RECOGNITION_FAILED',
} as const;

export const TranscriptionErrorCode = { ...DomainErrorCode, ...TranscriptionDomainCodes } as const;
export type TranscriptionErrorCodeType = (typeof TranscriptionErrorCode)[keyof typeof TranscriptionErrorCode];

const TranscriptionErrorBase = createDomainServiceError('Transcription', TranscriptionErrorCode);

export class TranscriptionError extends TranscriptionErrorBase {
  static permissionDenied() {
    return new TranscriptionError('Speech recognition permission denied', 403, TranscriptionErrorCode.PERMISSION_DENIED);
  }

  static recognitionFailed(reason: string, cause?: Error) {
    return new TranscriptionError(
      `Speech recognition failed: ${reason}`,
      422,
      TranscriptionErrorCode.RECOGNITION_FAILED,
      cause
    );
  }
}
