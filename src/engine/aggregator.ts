import type { ContactKey, DayKey } from "../utils/types.js";
import type {
  ActivityHistogram,
  ContactAggregate,
  EventsByContact,
  GlobalTotals,
  MessageEvent,
} from "./types.js";
import { dayKeyOf, type NightWindow } from "./clock.js";
import { InsufficientDataError } from "./errors.js";

/**
 * Process-wide running totals for one run. Created by the caller and
 * threaded through the per-contact fold, so the engine keeps no module state.
 */
export class GlobalAccumulator {
  private contacts = 0;
  private sent = 0;
  private received = 0;
  private lateNight = 0;
  private charsSent = 0;
  private emojiSent = 0;
  private wordsSent = 0;
  private first: number | null = null;
  private last: number | null = null;
  private readonly hourCounts: number[] = new Array<number>(24).fill(0);
  private readonly weekdayCounts: number[] = new Array<number>(7).fill(0);
  private readonly dailyCounts = new Map<DayKey, number>();
  private readonly emojiCounts = new Map<string, number>();

  addContact(): void {
    this.contacts++;
  }

  add(event: MessageEvent, day: DayKey, lateNight: boolean): void {
    if (event.direction === "sent") {
      this.sent++;
      this.charsSent += event.charLength;
      if (event.hasEmoji) this.emojiSent++;
      this.wordsSent += event.wordCount ?? 0;
      for (const emoji of event.emojis ?? []) {
        this.emojiCounts.set(emoji, (this.emojiCounts.get(emoji) ?? 0) + 1);
      }
    } else {
      this.received++;
    }
    if (lateNight) this.lateNight++;

    if (this.first === null || event.timestamp < this.first) this.first = event.timestamp;
    if (this.last === null || event.timestamp > this.last) this.last = event.timestamp;

    const d = new Date(event.timestamp);
    this.hourCounts[d.getHours()]++;
    this.weekdayCounts[d.getDay()]++;
    this.dailyCounts.set(day, (this.dailyCounts.get(day) ?? 0) + 1);
  }

  totals(): GlobalTotals {
    const messages = this.sent + this.received;
    return {
      messages,
      sent: this.sent,
      received: this.received,
      contacts: this.contacts,
      lateNight: this.lateNight,
      lateNightFraction: messages > 0 ? this.lateNight / messages : null,
      firstTimestamp: this.first,
      lastTimestamp: this.last,
      charsSent: this.charsSent,
      emojiSent: this.emojiSent,
      wordsSent: this.wordsSent,
    };
  }

  histogram(): ActivityHistogram {
    return {
      hourCounts: [...this.hourCounts],
      weekdayCounts: [...this.weekdayCounts],
      dailyCounts: new Map(this.dailyCounts),
      emojiCounts: new Map(this.emojiCounts),
    };
  }
}

/**
 * Fold one contact's ordered events into its aggregate.
 * The result is frozen; it is never updated after the fold.
 */
export function aggregateContact(
  contactKey: ContactKey,
  events: readonly MessageEvent[],
  isNight: NightWindow,
  accumulator: GlobalAccumulator = new GlobalAccumulator(),
): ContactAggregate {
  if (events.length === 0) {
    throw new InsufficientDataError("aggregate", "no events", contactKey);
  }

  let totalSent = 0;
  let totalReceived = 0;
  let lateNightCount = 0;
  let charsSent = 0;
  let charsReceived = 0;
  let emojiSent = 0;
  const perDayCounts: Record<string, number> = {};

  for (const event of events) {
    const day = dayKeyOf(event.timestamp);
    const lateNight = isNight(event.timestamp);

    if (event.direction === "sent") {
      totalSent++;
      charsSent += event.charLength;
      if (event.hasEmoji) emojiSent++;
    } else {
      totalReceived++;
      charsReceived += event.charLength;
    }
    if (lateNight) lateNightCount++;
    perDayCounts[day] = (perDayCounts[day] ?? 0) + 1;

    accumulator.add(event, day, lateNight);
  }
  accumulator.addContact();

  return Object.freeze({
    contactKey,
    totalSent,
    totalReceived,
    perDayCounts: Object.freeze(perDayCounts),
    lateNightCount,
    firstSeen: events[0].timestamp,
    lastSeen: events[events.length - 1].timestamp,
    charsSent,
    charsReceived,
    emojiSent,
  });
}

export function aggregateAll(
  eventsByContact: EventsByContact,
  isNight: NightWindow,
  accumulator: GlobalAccumulator,
): Map<ContactKey, ContactAggregate> {
  const aggregates = new Map<ContactKey, ContactAggregate>();
  for (const [contactKey, events] of eventsByContact) {
    if (events.length === 0) continue;
    aggregates.set(contactKey, aggregateContact(contactKey, events, isNight, accumulator));
  }
  return aggregates;
}
