import type { EngineConfig } from "../config/types.js";
import { parseEngineConfig } from "../config/schema.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { ContactKey } from "../utils/types.js";
import type {
  ContactLatency,
  EngineInput,
  Exclusion,
  LatencySample,
  MetricBundle,
  SkewResult,
  TrendResult,
  TrendWindows,
} from "./types.js";
import { normalizeInput } from "./events.js";
import { createNightWindow } from "./clock.js";
import { aggregateAll, GlobalAccumulator } from "./aggregator.js";
import { pairTurns, summarizeContactLatency, summarizeLatency } from "./latency.js";
import { detectTrends, resolveTrendWindows } from "./trend.js";
import { analyzeSkew } from "./skew.js";
import { summarizeActivity } from "./activity.js";
import { buildPersonalityInputs, classifyPersonality } from "./personality/index.js";
import { buildRankings, type ContactMetrics } from "./ranking.js";
import { InsufficientDataError } from "./errors.js";

/** Own data properties only; a key such as "__proto__" stays an ordinary entry. */
function toRecord<T>(entries: Iterable<readonly [ContactKey, T]>): Record<string, T> {
  return Object.fromEntries(entries);
}

/**
 * Batch metrics engine. One `compute` call is one run: events in,
 * MetricBundle out, nothing retained between runs.
 */
export class MetricsEngine {
  constructor(
    private readonly config: EngineConfig,
    private readonly logger: Logger,
  ) {}

  /**
   * Compute the full bundle. Input must already be ordered per contact;
   * an out-of-order sequence throws InvalidEventOrderError.
   * Metrics that lack data are skipped per contact and listed in
   * `exclusions`.
   */
  compute(input: EngineInput): MetricBundle {
    const started = Date.now();
    const eventsByContact = normalizeInput(input);
    const exclusions: Exclusion[] = [];

    const accumulator = new GlobalAccumulator();
    const aggregates = aggregateAll(eventsByContact, createNightWindow(this.config.nightWindow), accumulator);
    const totals = accumulator.totals();

    this.logger.debug({ contacts: totals.contacts, messages: totals.messages }, "Aggregated events");

    // Latency
    const allSamples: LatencySample[] = [];
    const latencies = new Map<ContactKey, ContactLatency>();
    for (const [contactKey, events] of eventsByContact) {
      const samples = pairTurns(contactKey, events);
      for (const sample of samples) allSamples.push(sample);
      const latency = this.attempt(exclusions, () =>
        summarizeContactLatency(contactKey, samples, this.config.latency),
      );
      if (latency) latencies.set(contactKey, latency);
    }
    const globalLatency = summarizeLatency(allSamples, this.config.latency);

    // Trend
    let windows: TrendWindows | null = null;
    if (totals.firstTimestamp !== null && totals.lastTimestamp !== null) {
      const { firstTimestamp, lastTimestamp } = totals;
      windows = this.attempt(exclusions, () =>
        resolveTrendWindows(firstTimestamp, lastTimestamp, this.config.trend.windowFraction),
      );
    }
    const trends = new Map<ContactKey, TrendResult>();
    for (const trend of detectTrends(aggregates.values(), windows, this.config.trend)) {
      trends.set(trend.contactKey, trend);
    }

    // Skew
    const skews = new Map<ContactKey, SkewResult>();
    let sessions = 0;
    let sentOpeners = 0;
    for (const [contactKey, aggregate] of aggregates) {
      const skew = analyzeSkew(aggregate, eventsByContact.get(contactKey) ?? [], this.config.session);
      skews.set(contactKey, skew);
      sessions += skew.sessions;
      sentOpeners += skew.sentOpeners;
    }
    const initiationRatio = sessions > 0 ? sentOpeners / sessions : null;

    // Global classification
    const activity = summarizeActivity(accumulator.histogram(), totals);
    const personality = classifyPersonality(
      buildPersonalityInputs(totals, globalLatency, initiationRatio, activity),
      this.config.personality,
    );

    // Rankings
    const joined: ContactMetrics[] = [];
    for (const [contactKey, aggregate] of aggregates) {
      const trend = trends.get(contactKey);
      const skew = skews.get(contactKey);
      if (!trend || !skew) continue;
      joined.push({ contactKey, aggregate, latency: latencies.get(contactKey) ?? null, trend, skew });
    }
    const rankings = buildRankings(joined, this.config.ranking);

    this.logger.info(
      {
        contacts: totals.contacts,
        messages: totals.messages,
        personality: personality.id,
        exclusions: exclusions.length,
        durationMs: Date.now() - started,
      },
      "Metrics computed",
    );

    return {
      totals,
      contacts: toRecord(aggregates),
      latency: { global: globalLatency, byContact: toRecord(latencies) },
      trend: { windows, byContact: toRecord(trends) },
      skew: { initiationRatio, byContact: toRecord(skews) },
      activity,
      personality,
      rankings,
      exclusions,
    };
  }

  /**
   * Run one metric step. InsufficientDataError becomes an exclusion;
   * anything else propagates.
   */
  private attempt<T>(exclusions: Exclusion[], step: () => T): T | null {
    try {
      return step();
    } catch (err) {
      if (!(err instanceof InsufficientDataError)) throw err;
      exclusions.push({ contactKey: err.contactKey, metric: err.metric ?? "unknown", reason: err.reason });
      this.logger.debug({ contactKey: err.contactKey, metric: err.metric, reason: err.reason }, "Metric skipped");
      return null;
    }
  }
}

/**
 * Single entry point: `compute(events, config) → MetricBundle`.
 * Config defaults to the schema defaults; logging is off unless a logger is given.
 */
export function compute(
  input: EngineInput,
  config: EngineConfig = parseEngineConfig({}),
  logger: Logger = createSilentLogger(),
): MetricBundle {
  return new MetricsEngine(config, logger).compute(input);
}
