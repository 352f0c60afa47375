import type { PersonalityThresholds } from "../../config/types.js";
import type { PersonalityId, PersonalityInputs } from "../types.js";

export interface PersonalityRule {
  readonly id: PersonalityId;
  readonly label: string;
  readonly tagline: string;
  matches(inputs: PersonalityInputs, thresholds: PersonalityThresholds): boolean;
}

function inHourRange(hour: number, start: number, end: number): boolean {
  return start <= end ? hour >= start && hour < end : hour >= start || hour < end;
}

// ── Built-in rules, in evaluation order ──

/**
 * The busiest hour of the day is a late one, or a big share of the
 * year's messages fall inside the night window.
 */
const nightOwl: PersonalityRule = {
  id: "night_owl",
  label: "Night Owl",
  tagline: "does their best texting after midnight",
  matches({ peakHour, lateNightFraction }, t) {
    if (peakHour !== null && inHourRange(peakHour, t.nightOwlPeakHourStart, t.nightOwlPeakHourEnd)) {
      return true;
    }
    return lateNightFraction !== null && lateNightFraction >= t.nightOwlMinLateNightFraction;
  },
};

/**
 * Replies within minutes and sends a lot of messages.
 */
const alwaysOnline: PersonalityRule = {
  id: "always_online",
  label: "Always Online",
  tagline: "the phone never leaves their hand",
  matches({ replyMeanSeconds, totalMessages }, t) {
    return (
      replyMeanSeconds !== null &&
      replyMeanSeconds <= t.alwaysOnlineMaxReplySeconds &&
      totalMessages >= t.alwaysOnlineMinMessages
    );
  },
};

const leavesOnRead: PersonalityRule = {
  id: "leaves_on_read",
  label: "Leaves You On Read",
  tagline: "will get back to you. eventually.",
  matches({ replyMeanSeconds }, t) {
    return replyMeanSeconds !== null && replyMeanSeconds >= t.leavesOnReadMinReplySeconds;
  },
};

/**
 * Receives far more than they send.
 */
const inDemand: PersonalityRule = {
  id: "in_demand",
  label: "In Demand",
  tagline: "everyone wants a piece of their time",
  matches({ sendRatio }, t) {
    return sendRatio !== null && sendRatio <= t.inDemandMaxSendRatio;
  },
};

const yapper: PersonalityRule = {
  id: "yapper",
  label: "The Yapper",
  tagline: "carries every conversation single-handedly",
  matches({ sendRatio, sent, received }, t) {
    // Nothing received leaves the ratio undefined; any sending at all is yapping
    if (sendRatio === null) return received === 0 && sent > 0;
    return sendRatio >= t.yapperMinSendRatio;
  },
};

const conversationStarter: PersonalityRule = {
  id: "conversation_starter",
  label: "Conversation Starter",
  tagline: "always makes the first move",
  matches({ initiationRatio }, t) {
    return initiationRatio !== null && initiationRatio >= t.starterMinInitiationRatio;
  },
};

const chillOne: PersonalityRule = {
  id: "chill_one",
  label: "The Chill One",
  tagline: "never texts first, never stressed",
  matches({ initiationRatio }, t) {
    return initiationRatio !== null && initiationRatio <= t.chillMaxInitiationRatio;
  },
};

/** Always matches; keeps the classifier total. */
export const fallbackPersonalityRule: PersonalityRule = {
  id: "steady_texter",
  label: "Steady Texter",
  tagline: "no notes. balanced, reliable, reachable.",
  matches() {
    return true;
  },
};

export const personalityRules: readonly PersonalityRule[] = [
  nightOwl,
  alwaysOnline,
  leavesOnRead,
  inDemand,
  yapper,
  conversationStarter,
  chillOne,
  fallbackPersonalityRule,
];
