import { and, desc, eq, gte, lte } from 'drizzle-orm';
import { errorMessage } from '@moodlens/platform-core';
import type { DatabaseConnection } from '../database/DatabaseConnectionFactory';
import { checkinRecords } from '../database/schema';
import { toCheckInRecord, type CheckInRecord, type EmotionAnalysis } from '../../domains/entities';
import type { ICheckInRepository } from '../../domains/repositories';
import { getLogger } from '../../config/service-config';
import { StorageError } from '../../application/errors';

const logger = getLogger('checkin-repository');

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export class DrizzleCheckInRepository implements ICheckInRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async save(analysis: EmotionAnalysis, notes?: string | null): Promise<CheckInRecord> {
    const values = toCheckInRecord(analysis, notes);
    try {
      const [record] = await this.db.insert(checkinRecords).values(values).returning();
      if (!record) throw new Error('insert returned no row');
      logger.info('Check-in saved', { checkInId: record.id, primaryEmotion: record.primaryEmotion });
      return record;
    } catch (error) {
      throw StorageError.saveFailed(errorMessage(error), asError(error));
    }
  }

  async fetchAll(): Promise<CheckInRecord[]> {
    try {
      return await this.db.select().from(checkinRecords).orderBy(desc(checkinRecords.timestamp));
    } catch (error) {
      throw StorageError.fetchFailed(errorMessage(error), asError(error));
    }
  }

  async fetch(from: Date, to: Date): Promise<CheckInRecord[]> {
    try {
      return await this.db
        .select()
        .from(checkinRecords)
        .where(and(gte(checkinRecords.timestamp, from), lte(checkinRecords.timestamp, to)))
        .orderBy(desc(checkinRecords.timestamp));
    } catch (error) {
      throw StorageError.fetchFailed(errorMessage(error), asError(error));
    }
  }

  async delete(record: Pick<CheckInRecord, 'id'>): Promise<void> {
    try {
      await this.db.delete(checkinRecords).where(eq(checkinRecords.id, record.id));
    } catch (error) {
      throw StorageError.deleteFailed(errorMessage(error), asError(error));
    }
  }

  async deleteAll(): Promise<void> {
    try {
      await this.db.delete(checkinRecords);
    } catch (error) {
      throw StorageError.deleteFailed(errorMessage(error), asError(error));
    }
  }

  async updateTimestamp(id: string, timestamp: Date): Promise<CheckInRecord> {
    let updated: CheckInRecord | undefined;
    try {
      [updated] = await this.db
        .update(checkinRecords)
        .set({ timestamp })
        .where(eq(checkinRecords.id, id))
        .returning();
    } catch (error) {
      throw StorageError.saveFailed(errorMessage(error), asError(error));
    }
    if (!updated) throw StorageError.notFound('CheckInRecord', id);
    return updated;
  }
}
