import type { DayKey } from "../utils/types.js";
import type { ActivityHistogram, ActivitySummary, DayCount, EmojiCount, GlobalTotals, Weekday } from "./types.js";
import { daysBetween } from "./clock.js";

const WEEKDAYS: readonly Weekday[] = [
  "Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday",
];

const TOP_DAYS = 5;
const TOP_EMOJIS = 5;

/** Index of the largest count; the earliest index wins a tie. Null when all are zero. */
function peakIndex(counts: readonly number[]): number | null {
  let best: number | null = null;
  for (let i = 0; i < counts.length; i++) {
    if (counts[i] > 0 && (best === null || counts[i] > counts[best])) best = i;
  }
  return best;
}

function streaks(days: readonly DayKey[]): { longest: number; current: number } {
  if (days.length === 0) return { longest: 0, current: 0 };

  let longest = 1;
  let run = 1;
  for (let i = 1; i < days.length; i++) {
    run = daysBetween(days[i - 1], days[i]) === 1 ? run + 1 : 1;
    if (run > longest) longest = run;
  }
  return { longest, current: run };
}

/** Count descending, then key in code-unit order. */
function byCountThenKey<T>(key: (item: T) => string, count: (item: T) => number) {
  return (a: T, b: T): number => {
    const diff = count(b) - count(a);
    if (diff !== 0) return diff;
    const ka = key(a);
    const kb = key(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  };
}

/**
 * Daily-rhythm highlights from the global histogram: peak hour, busiest
 * weekday and day, streaks of active days, message length, emoji rate
 * and the most-sent emoji.
 */
export function summarizeActivity(histogram: ActivityHistogram, totals: GlobalTotals): ActivitySummary {
  const days = [...histogram.dailyCounts.keys()].sort();
  const byVolume: DayCount[] = days
    .map((date) => ({ date, count: histogram.dailyCounts.get(date) ?? 0 }))
    .sort(byCountThenKey<DayCount>((d) => d.date, (d) => d.count));
  const emojis: EmojiCount[] = [...histogram.emojiCounts]
    .map(([emoji, count]) => ({ emoji, count }))
    .sort(byCountThenKey<EmojiCount>((e) => e.emoji, (e) => e.count));

  const weekday = peakIndex(histogram.weekdayCounts);
  const { longest, current } = streaks(days);

  return {
    hourCounts: histogram.hourCounts,
    weekdayCounts: histogram.weekdayCounts,
    peakHour: peakIndex(histogram.hourCounts),
    busiestWeekday: weekday === null ? null : WEEKDAYS[weekday],
    busiestDay: byVolume[0] ?? null,
    topDays: byVolume.slice(0, TOP_DAYS),
    activeDays: days.length,
    longestStreak: longest,
    currentStreak: current,
    averageSentLength: totals.sent > 0 ? totals.charsSent / totals.sent : null,
    emojiRate: totals.sent > 0 ? totals.emojiSent / totals.sent : null,
    topEmojis: emojis.slice(0, TOP_EMOJIS),
  };
}
