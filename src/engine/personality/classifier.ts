import type { PersonalityThresholds } from "../../config/types.js";
import type {
  ActivitySummary,
  GlobalTotals,
  LatencySummary,
  PersonalityInputs,
  PersonalityResult,
} from "../types.js";
import { fallbackPersonalityRule, personalityRules, type PersonalityRule } from "./rules.js";

export function buildPersonalityInputs(
  totals: GlobalTotals,
  latency: LatencySummary,
  initiationRatio: number | null,
  activity: ActivitySummary,
): PersonalityInputs {
  return {
    totalMessages: totals.messages,
    sent: totals.sent,
    received: totals.received,
    sendRatio: totals.received > 0 ? totals.sent / totals.received : null,
    replyMeanSeconds: latency.you?.meanSeconds ?? null,
    replyMedianSeconds: latency.you?.medianSeconds ?? null,
    lateNightFraction: totals.lateNightFraction,
    initiationRatio,
    peakHour: activity.peakHour,
  };
}

/**
 * First matching rule wins. Precedence is the order of `rules`;
 * when no rule matches, the fallback label is used, so the result
 * is always exactly one label.
 */
export function classifyPersonality(
  inputs: PersonalityInputs,
  thresholds: PersonalityThresholds,
  rules: readonly PersonalityRule[] = personalityRules,
): PersonalityResult {
  let precedence = rules.findIndex((rule) => rule.matches(inputs, thresholds));
  const rule = precedence >= 0 ? rules[precedence] : fallbackPersonalityRule;
  if (precedence < 0) precedence = rules.length;

  return {
    id: rule.id,
    label: rule.label,
    tagline: rule.tagline,
    precedence,
    inputs,
  };
}
