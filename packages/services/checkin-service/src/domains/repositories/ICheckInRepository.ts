import type { CheckInRecord, EmotionAnalysis } from '../entities';

/**
 * Persistent store of check-in records. Every failure surfaces as a StorageError.
 */
export interface ICheckInRepository {
  save(analysis: EmotionAnalysis, notes?: string | null): Promise<CheckInRecord>;
  /** Newest first */
  fetchAll(): Promise<CheckInRecord[]>;
  /** Inclusive on both bounds, newest first */
  fetch(from: Date, to: Date): Promise<CheckInRecord[]>;
  delete(record: Pick<CheckInRecord, 'id'>): Promise<void>;
  deleteAll(): Promise<void>;
  updateTimestamp(id: string, timestamp: Date): Promise<CheckInRecord>;
}
