import type { SessionConfig } from "../config/types.js";
import type { ContactAggregate, InitiatorDirection, MessageEvent, SkewResult } from "./types.js";

/**
 * Session openers: the first event, plus every event that follows an
 * idle gap longer than the threshold.
 */
export function findSessionOpeners(events: readonly MessageEvent[], idleGapMs: number): MessageEvent[] {
  if (events.length === 0) return [];

  const openers: MessageEvent[] = [events[0]];
  for (let i = 1; i < events.length; i++) {
    if (events[i].timestamp - events[i - 1].timestamp > idleGapMs) {
      openers.push(events[i]);
    }
  }
  return openers;
}

/** Share of messages you sent; null when there is nothing to divide by. */
export function sentRatio(sent: number, received: number): number | null {
  const total = sent + received;
  return total > 0 ? sent / total : null;
}

export function analyzeSkew(
  aggregate: ContactAggregate,
  events: readonly MessageEvent[],
  config: SessionConfig,
): SkewResult {
  const openers = findSessionOpeners(events, config.idleGapMs);
  const sentOpeners = openers.filter((e) => e.direction === "sent").length;
  const receivedOpeners = openers.length - sentOpeners;

  let initiatorDirection: InitiatorDirection = "even";
  if (sentOpeners > receivedOpeners) initiatorDirection = "sent";
  else if (receivedOpeners > sentOpeners) initiatorDirection = "received";

  return {
    contactKey: aggregate.contactKey,
    sentRatio: sentRatio(aggregate.totalSent, aggregate.totalReceived),
    sessions: openers.length,
    sentOpeners,
    receivedOpeners,
    initiationRatio: openers.length > 0 ? sentOpeners / openers.length : null,
    initiatorDirection,
  };
}
