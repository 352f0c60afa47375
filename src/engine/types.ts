import type { ContactKey, DayKey } from "../utils/types.js";

export type Direction = "sent" | "received";

// ── Input ──

export interface MessageEvent {
  readonly contactKey: ContactKey;
  /** Epoch milliseconds; read in the process-local time zone. */
  readonly timestamp: number;
  readonly direction: Direction;
  readonly charLength: number;
  readonly hasEmoji?: boolean;
  readonly wordCount?: number;
  /** Distinct emoji in the message. */
  readonly emojis?: readonly string[];
}

/** Per-contact event lists, each ordered by timestamp. */
export type EventsByContact = ReadonlyMap<ContactKey, readonly MessageEvent[]>;

export type EngineInput = readonly MessageEvent[] | EventsByContact;

// ── Per-contact aggregates ──

export interface ContactAggregate {
  readonly contactKey: ContactKey;
  readonly totalSent: number;
  readonly totalReceived: number;
  readonly perDayCounts: Readonly<Record<string, number>>;
  readonly lateNightCount: number;
  readonly firstSeen: number;
  readonly lastSeen: number;
  readonly charsSent: number;
  readonly charsReceived: number;
  readonly emojiSent: number;
}

export interface GlobalTotals {
  readonly messages: number;
  readonly sent: number;
  readonly received: number;
  readonly contacts: number;
  readonly lateNight: number;
  readonly lateNightFraction: number | null;
  readonly firstTimestamp: number | null;
  readonly lastTimestamp: number | null;
  readonly charsSent: number;
  readonly emojiSent: number;
  readonly wordsSent: number;
}

export interface ActivityHistogram {
  readonly hourCounts: readonly number[];
  readonly weekdayCounts: readonly number[];
  readonly dailyCounts: ReadonlyMap<DayKey, number>;
  /** Sent messages containing each emoji. */
  readonly emojiCounts: ReadonlyMap<string, number>;
}

// ── Latency ──

export interface LatencySample {
  readonly contactKey: ContactKey;
  /** Who replied: "sent" means you answered them. */
  readonly responderDirection: Direction;
  readonly delaySeconds: number;
}

export interface LatencyStats {
  readonly count: number;
  readonly meanSeconds: number;
  readonly medianSeconds: number;
}

export interface LatencySummary {
  readonly samples: number;
  /** Samples above the delay cap; counted here, left out of the stats. */
  readonly outliers: number;
  readonly overall: LatencyStats | null;
  readonly you: LatencyStats | null;
  readonly them: LatencyStats | null;
}

export interface ContactLatency extends LatencySummary {
  readonly contactKey: ContactKey;
}

// ── Trend ──

export type TrendClassification = "heating_up" | "ghosted" | "stable";

export interface TrendWindows {
  readonly firstDay: DayKey;
  readonly lastDay: DayKey;
  readonly days: number;
  readonly windowDays: number;
  readonly earlyEnd: DayKey;
  readonly lateStart: DayKey;
}

export interface TrendResult {
  readonly contactKey: ContactKey;
  readonly earlyWindowCount: number;
  readonly lateWindowCount: number;
  readonly classification: TrendClassification;
}

// ── Skew ──

export type InitiatorDirection = Direction | "even";

export interface SkewResult {
  readonly contactKey: ContactKey;
  readonly sentRatio: number | null;
  readonly sessions: number;
  readonly sentOpeners: number;
  readonly receivedOpeners: number;
  readonly initiationRatio: number | null;
  readonly initiatorDirection: InitiatorDirection;
}

// ── Activity ──

export type Weekday =
  | "Sunday" | "Monday" | "Tuesday" | "Wednesday" | "Thursday" | "Friday" | "Saturday";

export interface DayCount {
  readonly date: DayKey;
  readonly count: number;
}

export interface EmojiCount {
  readonly emoji: string;
  readonly count: number;
}

export interface ActivitySummary {
  readonly hourCounts: readonly number[];
  readonly weekdayCounts: readonly number[];
  readonly peakHour: number | null;
  readonly busiestWeekday: Weekday | null;
  readonly busiestDay: DayCount | null;
  readonly topDays: readonly DayCount[];
  readonly activeDays: number;
  readonly longestStreak: number;
  /** Consecutive active days ending on the last active day. */
  readonly currentStreak: number;
  readonly averageSentLength: number | null;
  readonly emojiRate: number | null;
  readonly topEmojis: readonly EmojiCount[];
}

// ── Personality ──

export type PersonalityId =
  | "night_owl"
  | "always_online"
  | "leaves_on_read"
  | "in_demand"
  | "yapper"
  | "conversation_starter"
  | "chill_one"
  | "steady_texter";

export interface PersonalityInputs {
  readonly totalMessages: number;
  readonly sent: number;
  readonly received: number;
  readonly sendRatio: number | null;
  readonly replyMeanSeconds: number | null;
  readonly replyMedianSeconds: number | null;
  readonly lateNightFraction: number | null;
  readonly initiationRatio: number | null;
  readonly peakHour: number | null;
}

export interface PersonalityResult {
  readonly id: PersonalityId;
  readonly label: string;
  readonly tagline: string;
  /** Position of the matching rule in the evaluation order. */
  readonly precedence: number;
  readonly inputs: PersonalityInputs;
}

// ── Rankings ──

export interface RankedEntry {
  readonly rank: number;
  readonly contactKey: ContactKey;
  readonly value: number;
}

export type RankingName =
  | "topContacts"
  | "lateNight"
  | "fastestReplies"
  | "quickestResponders"
  | "heatingUp"
  | "ghosted"
  | "biggestFans"
  | "simps"
  | "downBad"
  | "youTextFirst"
  | "theyTextFirst";

export type Rankings = Readonly<Record<RankingName, readonly RankedEntry[]>>;

// ── Output ──

export interface Exclusion {
  readonly contactKey: ContactKey | null;
  readonly metric: string;
  readonly reason: string;
}

/** Everything a report renderer needs. Plain JSON, keys in contact-key order. */
export interface MetricBundle {
  readonly totals: GlobalTotals;
  readonly contacts: Readonly<Record<string, ContactAggregate>>;
  readonly latency: {
    readonly global: LatencySummary;
    readonly byContact: Readonly<Record<string, ContactLatency>>;
  };
  readonly trend: {
    readonly windows: TrendWindows | null;
    readonly byContact: Readonly<Record<string, TrendResult>>;
  };
  readonly skew: {
    readonly initiationRatio: number | null;
    readonly byContact: Readonly<Record<string, SkewResult>>;
  };
  readonly activity: ActivitySummary;
  readonly personality: PersonalityResult;
  readonly rankings: Rankings;
  readonly exclusions: readonly Exclusion[];
}
