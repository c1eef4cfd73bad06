import type { PostRecord } from './models.js';
import { addDays, formatRange, localDateKey, startOfDay } from './dates.js';

export const DAY_COUNT = 14;

export interface DaySlot {
  key: string;
  date: Date;
  isToday: boolean;
  isPast: boolean;
  posts: PostRecord[];
}

export interface Calendar {
  label: string;
  prevStart: string;
  nextStart: string;
  days: DaySlot[];
}

/**
 * A two-week strip starting at `start`, with each day's posts in the order
 * they were given.
 */
export function buildCalendar(start: Date, posts: PostRecord[], today = new Date()): Calendar {
  const first = startOfDay(start);
  const todayKey = localDateKey(today);
  const todayStart = startOfDay(today).getTime();

  const byDay = new Map<string, PostRecord[]>();
  for (const post of posts) {
    const key = localDateKey(new Date(post.scheduledAt));
    const arr = byDay.get(key) || [];
    arr.push(post);
    byDay.set(key, arr);
  }

  const days: DaySlot[] = [];
  for (let i = 0; i < DAY_COUNT; i++) {
    const date = addDays(first, i);
    const key = localDateKey(date);
    days.push({
      key,
      date,
      isToday: key === todayKey,
      isPast: date.getTime() < todayStart,
      posts: byDay.get(key) || []
    });
  }

  return {
    label: formatRange(first, addDays(first, DAY_COUNT - 1)),
    prevStart: localDateKey(addDays(first, -DAY_COUNT)),
    nextStart: localDateKey(addDays(first, DAY_COUNT)),
    days
  };
}
