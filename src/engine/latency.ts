import type { LatencyConfig } from "../config/types.js";
import type { ContactKey } from "../utils/types.js";
import type {
  ContactLatency,
  LatencySample,
  LatencyStats,
  LatencySummary,
  MessageEvent,
} from "./types.js";
import { InsufficientDataError } from "./errors.js";

/**
 * Turn pairing: every direction flip between consecutive events is one
 * reply, timed from the prompting message. Same-direction pairs are not
 * replies and produce nothing.
 */
export function pairTurns(contactKey: ContactKey, events: readonly MessageEvent[]): LatencySample[] {
  const samples: LatencySample[] = [];
  for (let i = 1; i < events.length; i++) {
    const prompt = events[i - 1];
    const reply = events[i];
    if (prompt.direction === reply.direction) continue;

    samples.push({
      contactKey,
      responderDirection: reply.direction,
      delaySeconds: (reply.timestamp - prompt.timestamp) / 1000,
    });
  }
  return samples;
}

/** Mean and median; the median of an even count averages the middle pair. */
export function computeStats(delays: readonly number[]): LatencyStats | null {
  if (delays.length === 0) return null;

  const sorted = [...delays].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  const mean = sorted.reduce((sum, d) => sum + d, 0) / sorted.length;

  return { count: sorted.length, meanSeconds: mean, medianSeconds: median };
}

export function summarizeLatency(samples: readonly LatencySample[], config: LatencyConfig): LatencySummary {
  const capSeconds = config.maxDelayMs / 1000;
  const all: number[] = [];
  const you: number[] = [];
  const them: number[] = [];
  let outliers = 0;

  for (const sample of samples) {
    // Multi-day silences say nothing about reply speed
    if (sample.delaySeconds > capSeconds) {
      outliers++;
      continue;
    }
    all.push(sample.delaySeconds);
    (sample.responderDirection === "sent" ? you : them).push(sample.delaySeconds);
  }

  return {
    samples: samples.length,
    outliers,
    overall: computeStats(all),
    you: computeStats(you),
    them: computeStats(them),
  };
}

/**
 * Latency for one contact. Throws InsufficientDataError when the contact
 * never flipped direction or every reply exceeded the cap; such a contact
 * has no latency at all rather than a zero or infinite one.
 */
export function summarizeContactLatency(
  contactKey: ContactKey,
  samples: readonly LatencySample[],
  config: LatencyConfig,
): ContactLatency {
  if (samples.length === 0) {
    throw new InsufficientDataError("latency", "no direction flips", contactKey);
  }

  const summary = summarizeLatency(samples, config);
  if (!summary.overall) {
    throw new InsufficientDataError("latency", `all ${summary.samples} replies exceed the delay cap`, contactKey);
  }

  return { contactKey, ...summary };
}
