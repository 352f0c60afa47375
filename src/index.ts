export { compute, MetricsEngine } from "./engine/compute.js";
export {
  EngineError,
  InsufficientDataError,
  InvalidEventError,
  InvalidEventOrderError,
  type EngineErrorCode,
} from "./engine/errors.js";
export { groupByContact, normalizeInput, validateSequence } from "./engine/events.js";
export { aggregateAll, aggregateContact, GlobalAccumulator } from "./engine/aggregator.js";
export { computeStats, pairTurns, summarizeContactLatency, summarizeLatency } from "./engine/latency.js";
export { classifyTrend, countInWindows, detectTrends, resolveTrendWindows } from "./engine/trend.js";
export { analyzeSkew, findSessionOpeners, sentRatio } from "./engine/skew.js";
export { summarizeActivity } from "./engine/activity.js";
export {
  buildPersonalityInputs,
  classifyPersonality,
  fallbackPersonalityRule,
  personalityRules,
  type PersonalityRule,
} from "./engine/personality/index.js";
export { buildRankings, rankContacts, type ContactMetrics, type RankingOptions } from "./engine/ranking.js";
export {
  countWords,
  extractEmojis,
  loadEvents,
  parseEvents,
  rawEventSchema,
  toMessageEvent,
  type RawEvent,
} from "./ingest/event-file.js";
export { loadConfig, parseConfigText, substituteEnv } from "./config/loader.js";
export { engineConfigSchema, parseConfig, parseEngineConfig, wrappedConfigSchema } from "./config/schema.js";
export { createLogger, createSilentLogger, type Logger } from "./logging/logger.js";
export { ContactKey, DayKey } from "./utils/types.js";
export type * from "./engine/types.js";
export type * from "./config/types.js";
