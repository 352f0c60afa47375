import { describe, it, expect } from "vitest";
import { aggregateAll, GlobalAccumulator } from "../../src/engine/aggregator.js";
import { summarizeActivity } from "../../src/engine/activity.js";
import { createNightWindow } from "../../src/engine/clock.js";
import { groupByContact } from "../../src/engine/events.js";
import { at, makeEvent } from "../helpers/fixtures.js";

const isNight = createNightWindow({ start: "00:00", end: "05:00" });

function summarize(events: Parameters<typeof groupByContact>[0]) {
  const accumulator = new GlobalAccumulator();
  aggregateAll(groupByContact(events), isNight, accumulator);
  return summarizeActivity(accumulator.histogram(), accumulator.totals());
}

describe("summarizeActivity", () => {
  it("finds peaks, busiest days and streaks", () => {
    const activity = summarize([
      makeEvent("a", at(1, 1, 9, 0), "sent", { charLength: 10, hasEmoji: true }),
      makeEvent("a", at(1, 1, 9, 5), "received"),
      makeEvent("b", at(1, 2, 21, 0), "sent", { charLength: 4 }),
      makeEvent("b", at(1, 2, 21, 1), "sent", { charLength: 4 }),
      makeEvent("b", at(1, 2, 21, 2), "sent", { charLength: 4 }),
      makeEvent("a", at(1, 3, 9, 30), "received"),
      makeEvent("a", at(1, 5, 9, 10), "sent", { charLength: 6 }),
    ]);

    expect(activity.peakHour).toBe(9);
    expect(activity.hourCounts[21]).toBe(3);
    expect(activity.busiestWeekday).toBe("Thursday");
    expect(activity.busiestDay).toEqual({ date: "2025-01-02", count: 3 });
    expect(activity.topDays).toEqual([
      { date: "2025-01-02", count: 3 },
      { date: "2025-01-01", count: 2 },
      { date: "2025-01-03", count: 1 },
      { date: "2025-01-05", count: 1 },
    ]);
    expect(activity.activeDays).toBe(4);
    expect(activity.longestStreak).toBe(3);
    expect(activity.currentStreak).toBe(1);
    expect(activity.averageSentLength).toBe(5.6);
    expect(activity.emojiRate).toBe(0.2);
  });

  it("lists the most-sent emoji, breaking ties by emoji", () => {
    const activity = summarize([
      makeEvent("a", at(1, 1, 9), "sent", { emojis: ["😂", "🔥"] }),
      makeEvent("a", at(1, 1, 10), "sent", { emojis: ["😂"] }),
      makeEvent("a", at(1, 1, 11), "received", { emojis: ["💀", "💀"] }),
      makeEvent("a", at(1, 1, 12), "sent", { emojis: ["✨", "🙏", "👀", "💯"] }),
      makeEvent("a", at(1, 1, 13), "sent", { emojis: ["🔥"] }),
    ]);

    expect(activity.topEmojis).toEqual([
      { emoji: "🔥", count: 2 },
      { emoji: "😂", count: 2 },
      { emoji: "✨", count: 1 },
      { emoji: "👀", count: 1 },
      { emoji: "💯", count: 1 },
    ]);
  });

  it("picks the earliest hour on a tie", () => {
    const activity = summarize([
      makeEvent("a", at(1, 1, 22), "sent"),
      makeEvent("a", at(1, 1, 23), "received"),
      makeEvent("a", at(1, 2, 7), "sent"),
      makeEvent("a", at(1, 2, 8), "sent"),
      makeEvent("a", at(1, 3, 7), "sent"),
      makeEvent("a", at(1, 3, 22), "sent"),
    ]);
    expect(activity.peakHour).toBe(7);
    expect(activity.currentStreak).toBe(3);
  });

  it("returns empty highlights for no events", () => {
    const activity = summarize([]);
    expect(activity).toMatchObject({
      peakHour: null,
      busiestWeekday: null,
      busiestDay: null,
      topDays: [],
      activeDays: 0,
      longestStreak: 0,
      currentStreak: 0,
      averageSentLength: null,
      emojiRate: null,
      topEmojis: [],
    });
  });
});
