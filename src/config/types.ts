export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface WrappedConfig {
  readonly logging: LoggingConfig;
  readonly engine: EngineConfig;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}

export interface EngineConfig {
  readonly nightWindow: NightWindowConfig;
  readonly session: SessionConfig;
  readonly latency: LatencyConfig;
  readonly trend: TrendConfig;
  readonly ranking: RankingConfig;
  readonly personality: PersonalityThresholds;
}

export interface NightWindowConfig {
  readonly start: string; // "HH:MM"
  readonly end: string; // "HH:MM", exclusive
}

export interface SessionConfig {
  /** Gap after which the next message opens a new session. */
  readonly idleGapMs: number;
}

export interface LatencyConfig {
  /** Replies slower than this are kept as samples but left out of averages. */
  readonly maxDelayMs: number;
}

export interface TrendConfig {
  /** Share of the observed days that each of the early and late windows covers. At most 0.5. */
  readonly windowFraction: number;
  readonly growthThreshold: number;
  readonly declineThreshold: number;
  readonly minVolume: number;
}

export interface RankingConfig {
  readonly topN: number;
  /** How many times more one side must send for the fan / down-bad lists. */
  readonly fanRatio: number;
  readonly fanMinMessages: number;
  readonly initiatorMinSessions: number;
}

export interface PersonalityThresholds {
  readonly nightOwlMinLateNightFraction: number;
  /** Peak hours from start (inclusive) to end (exclusive), wrapping past midnight. */
  readonly nightOwlPeakHourStart: number;
  readonly nightOwlPeakHourEnd: number;
  readonly alwaysOnlineMaxReplySeconds: number;
  readonly alwaysOnlineMinMessages: number;
  readonly leavesOnReadMinReplySeconds: number;
  readonly inDemandMaxSendRatio: number;
  readonly yapperMinSendRatio: number;
  readonly starterMinInitiationRatio: number;
  readonly chillMaxInitiationRatio: number;
}
