import { toCheckInRecord, type CheckInRecord, type EmotionAnalysis } from '../../domains/entities';
import type { ICheckInRepository } from '../../domains/repositories';
import { StorageError } from '../../application/errors';

function newestFirst(a: CheckInRecord, b: CheckInRecord): number {
  return b.timestamp.getTime() - a.timestamp.getTime();
}

/**
 * Process-local store with the same ordering and range semantics as the database one
 */
export class InMemoryCheckInRepository implements ICheckInRepository {
  private readonly records = new Map<string, CheckInRecord>();

  constructor(seed: readonly CheckInRecord[] = []) {
    for (const record of seed) {
      this.records.set(record.id, { ...record });
    }
  }

  async save(analysis: EmotionAnalysis, notes?: string | null): Promise<CheckInRecord> {
    if (this.records.has(analysis.id)) {
      throw StorageError.saveFailed(`duplicate id ${analysis.id}`);
    }
    const record = toCheckInRecord(analysis, notes);
    this.records.set(record.id, record);
    return { ...record };
  }

  async fetchAll(): Promise<CheckInRecord[]> {
    return [...this.records.values()].map(record => ({ ...record })).sort(newestFirst);
  }

  async fetch(from: Date, to: Date): Promise<CheckInRecord[]> {
    const start = from.getTime();
    const end = to.getTime();
    return (await this.fetchAll()).filter(record => {
      const time = record.timestamp.getTime();
      return time >= start && time <= end;
    });
  }

  async delete(record: Pick<CheckInRecord, 'id'>): Promise<void> {
    this.records.delete(record.id);
  }

  async deleteAll(): Promise<void> {
    this.records.clear();
  }

  async updateTimestamp(id: string, timestamp: Date): Promise<CheckInRecord> {
    const existing = this.records.get(id);
    if (!existing) throw StorageError.notFound('CheckInRecord', id);
    const updated = { ...existing, timestamp };
    this.records.set(id, updated);
    return { ...updated };
  }
}
