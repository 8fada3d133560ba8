import { describe, it, expect } from 'vitest';
import { InMemoryCheckInRepository } from '../../infrastructure/repositories/InMemoryCheckInRepository';
import { createEmotionAnalysis, createEmotionScore } from '../../domains/entities';
import { atLocal, createDailyRecords } from '@moodlens/test-utils';

describe('InMemoryCheckInRepository', () => {
  it('should serve seeded records newest first and as copies', async () => {
    const seed = createDailyRecords(atLocal(2024, 3, 1), ['happy', 'sad']);
    const repository = new InMemoryCheckInRepository(seed);

    const records = await repository.fetchAll();
    expect(records.map(record => record.primaryEmotion)).toEqual(['sad', 'happy']);

    const [first] = records;
    if (first) first.userNotes = 'mutated';
    expect((await repository.fetchAll())[0]?.userNotes).toBeNull();
  });

  it('should save an analysis with normalised notes', async () => {
    const repository = new InMemoryCheckInRepository();
    const analysis = createEmotionAnalysis({ scores: [createEmotionScore('calm', 0.7)] });

    const record = await repository.save(analysis, '   ');

    expect(record.userNotes).toBeNull();
    expect(record.primaryEmotion).toBe('calm');
    await expect(repository.save(analysis)).rejects.toMatchObject({ code: 'SAVE_FAILED' });
  });

  it('should filter an inclusive range', async () => {
    const repository = new InMemoryCheckInRepository(createDailyRecords(atLocal(2024, 3, 1), ['happy', 'sad', 'calm']));

    const records = await repository.fetch(atLocal(2024, 3, 2), atLocal(2024, 3, 3));

    expect(records.map(record => record.primaryEmotion)).toEqual(['calm', 'sad']);
  });

  it('should update timestamps and report unknown ids', async () => {
    const [record] = createDailyRecords(atLocal(2024, 3, 1), ['happy']);
    const repository = new InMemoryCheckInRepository(record ? [record] : []);

    const updated = await repository.updateTimestamp(record?.id ?? '', atLocal(2024, 1, 5));
    expect(updated.timestamp).toEqual(atLocal(2024, 1, 5));
    await expect(repository.updateTimestamp('missing-id', new Date())).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});
