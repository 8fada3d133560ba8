/**
 * Emotion analytics over check-in records
 *
 * Pure functions; empty input yields an empty list or null, never an error.
 * Days and hours are local wall-clock time. Equal counts are ordered by the
 * emotion enumeration order so results are deterministic.
 */

import { emotionOrder, parseEmotionKind, type EmotionKind } from '@moodlens/shared-contracts';
import { decodeScores, type CheckInRecord } from '../../domains/entities';
import { localDayKey, localDayNumber, startOfLocalDay } from './calendar';
import type {
  DateRange,
  EmotionFrequency,
  StreakOptions,
  StreakResult,
  TimeOfDayBucket,
  TrendPoint,
} from './types';

type TimedRecord = Pick<CheckInRecord, 'timestamp'>;
type EmotionRecord = Pick<CheckInRecord, 'timestamp' | 'primaryEmotion'>;

function byEmotionOrder(a: EmotionKind, b: EmotionKind): number {
  return emotionOrder(a) - emotionOrder(b);
}

function countByEmotion(records: readonly EmotionRecord[]): Map<EmotionKind, number> {
  const counts = new Map<EmotionKind, number>();
  for (const record of records) {
    const emotion = parseEmotionKind(record.primaryEmotion);
    if (!emotion) continue;
    counts.set(emotion, (counts.get(emotion) ?? 0) + 1);
  }
  return counts;
}

function rankCounts(counts: Map<EmotionKind, number>): Array<[EmotionKind, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || byEmotionOrder(a[0], b[0]));
}

export function filterByDateRange<T extends TimedRecord>(records: readonly T[], from: Date, to: Date): T[] {
  const start = from.getTime();
  const end = to.getTime();
  return records.filter(record => {
    const time = record.timestamp.getTime();
    return time >= start && time <= end;
  });
}

export function calculateEmotionFrequency(records: readonly EmotionRecord[]): EmotionFrequency[] {
  if (records.length === 0) return [];

  const total = records.length;
  return rankCounts(countByEmotion(records)).map(([emotion, count]) => ({
    emotion,
    count,
    percentage: (count / total) * 100,
  }));
}

export function getDominantEmotion(records: readonly EmotionRecord[]): EmotionKind | null {
  const [top] = rankCounts(countByEmotion(records));
  return top ? top[0] : null;
}

/**
 * Longest run of days sharing the same majority emotion. The earliest of
 * equally long runs wins.
 */
export function calculateEmotionStreak(
  records: readonly EmotionRecord[],
  options: StreakOptions = {}
): StreakResult | null {
  const adjacency = options.adjacency ?? 'calendar';

  const days = new Map<number, EmotionRecord[]>();
  for (const record of records) {
    const day = localDayNumber(record.timestamp);
    const bucket = days.get(day);
    if (bucket) bucket.push(record);
    else days.set(day, [record]);
  }

  const dailyEmotions = [...days.entries()]
    .sort((a, b) => a[0] - b[0])
    .flatMap(([day, dayRecords]) => {
      const emotion = getDominantEmotion(dayRecords);
      return emotion ? [{ day, emotion }] : [];
    });

  let best: StreakResult | null = null;
  let current: { emotion: EmotionKind; days: number; lastDay: number } | null = null;

  for (const { day, emotion } of dailyEmotions) {
    const adjacent = current !== null && (adjacency === 'sequential' || day - current.lastDay === 1);
    if (current && adjacent && current.emotion === emotion) {
      current.days += 1;
      current.lastDay = day;
    } else {
      current = { emotion, days: 1, lastDay: day };
    }

    if (!best || current.days > best.days) {
      best = { emotion: current.emotion, days: current.days };
    }
  }

  return best;
}

/**
 * Mean confidence per (day, primary emotion). A record whose stored scores
 * lack its own primary emotion contributes 0 to the mean.
 */
export function calculateEmotionTrend(records: readonly CheckInRecord[], range?: DateRange): TrendPoint[] {
  const scoped = range ? filterByDateRange(records, range.from, range.to) : records;

  const groups = new Map<string, { date: Date; emotion: EmotionKind; total: number; count: number }>();
  for (const record of scoped) {
    const emotion = parseEmotionKind(record.primaryEmotion);
    if (!emotion) continue;

    const date = startOfLocalDay(record.timestamp);
    const key = `${localDayKey(date)}|${emotion}`;
    const confidence = decodeScores(record).find(score => score.emotion === emotion)?.confidence ?? 0;

    const group = groups.get(key);
    if (group) {
      group.total += confidence;
      group.count += 1;
    } else {
      groups.set(key, { date, emotion, total: confidence, count: 1 });
    }
  }

  return [...groups.values()]
    .map(group => ({
      date: group.date,
      emotion: group.emotion,
      averageConfidence: group.total / group.count,
    }))
    .sort((a, b) => a.date.getTime() - b.date.getTime() || byEmotionOrder(a.emotion, b.emotion));
}

export function calculateTimeOfDayPatterns(records: readonly EmotionRecord[]): TimeOfDayBucket[] {
  const counts = new Map<string, TimeOfDayBucket>();
  for (const record of records) {
    const emotion = parseEmotionKind(record.primaryEmotion);
    if (!emotion) continue;

    const hour = record.timestamp.getHours();
    const key = `${hour}|${emotion}`;
    const bucket = counts.get(key);
    if (bucket) bucket.count += 1;
    else counts.set(key, { hour, emotion, count: 1 });
  }

  return [...counts.values()].sort((a, b) => a.hour - b.hour || byEmotionOrder(a.emotion, b.emotion));
}
