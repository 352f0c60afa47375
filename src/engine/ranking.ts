import type { RankingConfig } from "../config/types.js";
import type { ContactKey } from "../utils/types.js";
import type {
  ContactAggregate,
  ContactLatency,
  RankedEntry,
  RankingName,
  Rankings,
  SkewResult,
  TrendResult,
} from "./types.js";

export type SortOrder = "desc" | "asc";

export interface RankingOptions {
  readonly limit: number;
  readonly order?: SortOrder;
}

/** Everything known about one contact, joined for ranking. */
export interface ContactMetrics {
  readonly contactKey: ContactKey;
  readonly aggregate: ContactAggregate;
  readonly latency: ContactLatency | null;
  readonly trend: TrendResult;
  readonly skew: SkewResult;
}

interface RankingDef {
  readonly order: SortOrder;
  metric(contact: ContactMetrics, config: RankingConfig): number | null;
}

function compareKeys(a: ContactKey, b: ContactKey): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Top-N by a metric. Items whose metric is null are left out. Ties fall
 * back to contact key in code-unit order, so identical input always
 * ranks identically. Fewer than `limit` items returns them all.
 */
export function rankContacts<T extends { readonly contactKey: ContactKey }>(
  items: readonly T[],
  metric: (item: T) => number | null,
  options: RankingOptions,
): RankedEntry[] {
  const direction = options.order === "asc" ? 1 : -1;

  const scored: Array<{ contactKey: ContactKey; value: number }> = [];
  for (const item of items) {
    const value = metric(item);
    if (value === null || Number.isNaN(value)) continue;
    scored.push({ contactKey: item.contactKey, value });
  }

  scored.sort((a, b) => {
    if (a.value !== b.value) return a.value < b.value ? -direction : direction;
    return compareKeys(a.contactKey, b.contactKey);
  });

  return scored.slice(0, options.limit).map((entry, i) => ({ rank: i + 1, ...entry }));
}

function volume(a: ContactAggregate): number {
  return a.totalSent + a.totalReceived;
}

const RANKINGS: Record<RankingName, RankingDef> = {
  topContacts: {
    order: "desc",
    metric: ({ aggregate }) => volume(aggregate),
  },
  lateNight: {
    order: "desc",
    metric: ({ aggregate }) => (aggregate.lateNightCount > 0 ? aggregate.lateNightCount : null),
  },
  // Median of your replies to them
  fastestReplies: {
    order: "asc",
    metric: ({ latency }) => latency?.you?.medianSeconds ?? null,
  },
  // Median of their replies to you
  quickestResponders: {
    order: "asc",
    metric: ({ latency }) => latency?.them?.medianSeconds ?? null,
  },
  heatingUp: {
    order: "desc",
    metric: ({ trend }) =>
      trend.classification === "heating_up" ? trend.lateWindowCount - trend.earlyWindowCount : null,
  },
  ghosted: {
    order: "desc",
    metric: ({ trend }) => (trend.classification === "ghosted" ? trend.earlyWindowCount : null),
  },
  // They send more than fanRatio times what you send
  biggestFans: {
    order: "desc",
    metric: ({ aggregate }, config) => {
      const { totalSent, totalReceived } = aggregate;
      if (volume(aggregate) < config.fanMinMessages) return null;
      if (totalReceived <= totalSent * config.fanRatio) return null;
      return totalReceived / Math.max(totalSent, 1);
    },
  },
  // You send more than fanRatio times what they send
  simps: {
    order: "desc",
    metric: ({ aggregate }, config) => {
      const { totalSent, totalReceived } = aggregate;
      if (volume(aggregate) < config.fanMinMessages) return null;
      if (totalSent <= totalReceived * config.fanRatio) return null;
      return totalSent / Math.max(totalReceived, 1);
    },
  },
  // They open more than fanRatio times the sessions you open: you always wait
  downBad: {
    order: "desc",
    metric: ({ skew }, config) => {
      const { sessions, sentOpeners, receivedOpeners } = skew;
      if (sessions < config.initiatorMinSessions) return null;
      if (receivedOpeners <= sentOpeners * config.fanRatio) return null;
      return receivedOpeners / Math.max(sentOpeners, 1);
    },
  },
  youTextFirst: {
    order: "desc",
    metric: ({ skew }, config) => {
      if (skew.sessions < config.initiatorMinSessions || skew.initiationRatio === null) return null;
      return skew.initiationRatio > 0.5 ? skew.initiationRatio : null;
    },
  },
  theyTextFirst: {
    order: "desc",
    metric: ({ skew }, config) => {
      if (skew.sessions < config.initiatorMinSessions || skew.initiationRatio === null) return null;
      return skew.initiationRatio < 0.5 ? 1 - skew.initiationRatio : null;
    },
  },
};

export function buildRankings(contacts: readonly ContactMetrics[], config: RankingConfig): Rankings {
  const rank = (name: RankingName): RankedEntry[] => {
    const def = RANKINGS[name];
    return rankContacts(contacts, (c) => def.metric(c, config), { limit: config.topN, order: def.order });
  };

  return {
    topContacts: rank("topContacts"),
    lateNight: rank("lateNight"),
    fastestReplies: rank("fastestReplies"),
    quickestResponders: rank("quickestResponders"),
    heatingUp: rank("heatingUp"),
    ghosted: rank("ghosted"),
    biggestFans: rank("biggestFans"),
    simps: rank("simps"),
    downBad: rank("downBad"),
    youTextFirst: rank("youTextFirst"),
    theyTextFirst: rank("theyTextFirst"),
  };
}
