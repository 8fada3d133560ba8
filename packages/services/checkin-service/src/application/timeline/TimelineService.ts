import type { EmotionKind } from '@moodlens/shared-contracts';
import { getLogger } from '../../config/service-config';
import type { CheckInRecord } from '../../domains/entities';
import type { ICheckInRepository } from '../../domains/repositories';
import { filterByDateRange } from '../analytics/emotion-analytics';
import { localDayKey } from '../analytics/calendar';
import type { DateRange } from '../analytics/types';

const logger = getLogger('timeline-service');

export interface TimelineFilter {
  emotion?: EmotionKind;
  range?: DateRange;
  search?: string;
}

export interface TimelineDay {
  /** YYYY-MM-DD, local time */
  day: string;
  records: CheckInRecord[];
}

function newestFirst(a: CheckInRecord, b: CheckInRecord): number {
  return b.timestamp.getTime() - a.timestamp.getTime();
}

export function groupByDay(records: readonly CheckInRecord[]): TimelineDay[] {
  const days = new Map<string, CheckInRecord[]>();
  for (const record of [...records].sort(newestFirst)) {
    const key = localDayKey(record.timestamp);
    const bucket = days.get(key);
    if (bucket) bucket.push(record);
    else days.set(key, [record]);
  }
  return [...days.entries()]
    .sort((a, b) => (a[0] < b[0] ? 1 : a[0] > b[0] ? -1 : 0))
    .map(([day, dayRecords]) => ({ day, records: dayRecords }));
}

export function filterRecords(records: readonly CheckInRecord[], filter: TimelineFilter = {}): CheckInRecord[] {
  let filtered = [...records];

  if (filter.emotion) {
    const emotion = filter.emotion;
    filtered = filtered.filter(record => record.primaryEmotion === emotion);
  }

  if (filter.range) {
    filtered = filterByDateRange(filtered, filter.range.from, filter.range.to);
  }

  const search = filter.search?.trim().toLowerCase();
  if (search) {
    filtered = filtered.filter(
      record =>
        record.primaryEmotion.toLowerCase().includes(search) ||
        (record.userNotes?.toLowerCase().includes(search) ?? false)
    );
  }

  return filtered;
}

/**
 * Read and delete access to the history, newest first
 */
export class TimelineService {
  constructor(private readonly repository: ICheckInRepository) {}

  async list(): Promise<CheckInRecord[]> {
    return this.repository.fetchAll();
  }

  async listRange(from: Date, to: Date): Promise<CheckInRecord[]> {
    return this.repository.fetch(from, to);
  }

  async remove(record: Pick<CheckInRecord, 'id'>): Promise<void> {
    await this.repository.delete(record);
    logger.info('Check-in deleted', { checkInId: record.id });
  }

  async removeAll(): Promise<void> {
    await this.repository.deleteAll();
    logger.info('All check-ins deleted');
  }

  async timeline(filter: TimelineFilter = {}): Promise<TimelineDay[]> {
    const records = await this.list();
    return groupByDay(filterRecords(records, filter));
  }
}
