import type { TrendConfig } from "../config/types.js";
import type { ContactAggregate, TrendClassification, TrendResult, TrendWindows } from "./types.js";
import { addDays, dayKeyOf, daysBetween } from "./clock.js";
import { InsufficientDataError } from "./errors.js";

/**
 * Early and late windows over the global observed range, in local calendar
 * days. Each window spans max(1, floor(days * fraction)) days; days between
 * the two windows are ignored. Every contact is measured against the same
 * windows.
 */
export function resolveTrendWindows(
  firstTimestamp: number,
  lastTimestamp: number,
  windowFraction: number,
): TrendWindows {
  const firstDay = dayKeyOf(firstTimestamp);
  const lastDay = dayKeyOf(lastTimestamp);
  const days = daysBetween(firstDay, lastDay) + 1;

  if (days < 2) {
    throw new InsufficientDataError("trend", `observed range covers ${days} day(s), need at least 2`);
  }

  const windowDays = Math.min(Math.max(1, Math.floor(days * windowFraction)), Math.floor(days / 2));

  return {
    firstDay,
    lastDay,
    days,
    windowDays,
    earlyEnd: addDays(firstDay, windowDays - 1),
    lateStart: addDays(lastDay, -(windowDays - 1)),
  };
}

export function countInWindows(
  perDayCounts: Readonly<Record<string, number>>,
  windows: TrendWindows,
): { early: number; late: number } {
  let early = 0;
  let late = 0;
  const lateFrom = windows.days - windows.windowDays;

  for (const [day, count] of Object.entries(perDayCounts)) {
    const index = daysBetween(windows.firstDay, day);
    if (index < windows.windowDays) early += count;
    else if (index >= lateFrom) late += count;
  }
  return { early, late };
}

/**
 * Ordered checks:
 *  1. total volume below minimum → stable
 *  2. silence in the late window after early activity → ghosted
 *  3. growth past the threshold, late volume above the minimum → heating_up
 *  4. decline past the threshold, early volume above the minimum → ghosted
 */
export function classifyTrend(early: number, late: number, config: TrendConfig): TrendClassification {
  if (early + late < config.minVolume) return "stable";
  if (late === 0 && early > 0) return "ghosted";
  if (late >= early * config.growthThreshold && late > config.minVolume) return "heating_up";
  if (early > config.minVolume && late <= early * config.declineThreshold) return "ghosted";
  return "stable";
}

/**
 * Trend for every contact. With no windows (range too short) each
 * contact is stable with empty counts.
 */
export function detectTrends(
  aggregates: Iterable<ContactAggregate>,
  windows: TrendWindows | null,
  config: TrendConfig,
): TrendResult[] {
  const results: TrendResult[] = [];

  for (const aggregate of aggregates) {
    if (!windows) {
      results.push({
        contactKey: aggregate.contactKey,
        earlyWindowCount: 0,
        lateWindowCount: 0,
        classification: "stable",
      });
      continue;
    }

    const { early, late } = countInWindows(aggregate.perDayCounts, windows);
    results.push({
      contactKey: aggregate.contactKey,
      earlyWindowCount: early,
      lateWindowCount: late,
      classification: classifyTrend(early, late, config),
    });
  }

  return results;
}
