import { describe, it, expect, beforeEach } from 'vitest';
import { TimelineService, filterRecords, groupByDay } from '../../application/timeline/TimelineService';
import { InMemoryCheckInRepository } from '../../infrastructure/repositories/InMemoryCheckInRepository';
import { atLocal, createMockCheckInRecord } from '@moodlens/test-utils';

const morning = createMockCheckInRecord({ primaryEmotion: 'happy', timestamp: atLocal(2024, 3, 2, 9) });
const evening = createMockCheckInRecord({
  primaryEmotion: 'sad',
  timestamp: atLocal(2024, 3, 2, 18),
  userNotes: 'Long walk in the rain',
});
const previous = createMockCheckInRecord({ primaryEmotion: 'calm', timestamp: atLocal(2024, 3, 1, 12) });

describe('groupByDay', () => {
  it('should group by local day, newest day and record first', () => {
    expect(groupByDay([previous, morning, evening])).toEqual([
      { day: '2024-03-02', records: [evening, morning] },
      { day: '2024-03-01', records: [previous] },
    ]);
  });
});

describe('filterRecords', () => {
  const records = [morning, evening, previous];

  it('should filter by emotion', () => {
    expect(filterRecords(records, { emotion: 'calm' })).toEqual([previous]);
  });

  it('should search notes and emotion names case-insensitively', () => {
    expect(filterRecords(records, { search: 'WALK' })).toEqual([evening]);
    expect(filterRecords(records, { search: ' Hap ' })).toEqual([morning]);
  });

  it('should apply an inclusive date range', () => {
    const range = { from: atLocal(2024, 3, 1, 12), to: atLocal(2024, 3, 2, 9) };
    expect(filterRecords(records, { range })).toEqual([morning, previous]);
  });

  it('should return everything without a filter', () => {
    expect(filterRecords(records)).toEqual(records);
  });
});

describe('TimelineService', () => {
  let repository: InMemoryCheckInRepository;
  let service: TimelineService;

  beforeEach(() => {
    repository = new InMemoryCheckInRepository([previous, morning, evening]);
    service = new TimelineService(repository);
  });

  it('should list newest first', async () => {
    expect((await service.list()).map(record => record.id)).toEqual([evening.id, morning.id, previous.id]);
  });

  it('should list an inclusive range', async () => {
    const records = await service.listRange(atLocal(2024, 3, 2, 9), atLocal(2024, 3, 2, 18));
    expect(records.map(record => record.id)).toEqual([evening.id, morning.id]);
  });

  it('should build a filtered timeline', async () => {
    expect(await service.timeline({ emotion: 'happy' })).toEqual([{ day: '2024-03-02', records: [morning] }]);
  });

  it('should delete one record or all of them', async () => {
    await service.remove(morning);
    expect((await service.list()).map(record => record.id)).toEqual([evening.id, previous.id]);

    await service.removeAll();
    expect(await service.list()).toEqual([]);
  });
});
