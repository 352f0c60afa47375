import type { ContactKey } from "../utils/types.js";
import type { EngineInput, EventsByContact, MessageEvent } from "./types.js";
import { InvalidEventError, InvalidEventOrderError } from "./errors.js";

/**
 * Check one contact's sequence against the normalizer contract.
 * Ordering policy is fail-fast: the engine never re-sorts. Equal
 * timestamps are accepted.
 */
export function validateSequence(contactKey: ContactKey, events: readonly MessageEvent[]): void {
  for (let i = 0; i < events.length; i++) {
    const event = events[i];

    if (event.contactKey !== contactKey) {
      throw new InvalidEventError(contactKey, i, `filed under ${contactKey} but keyed ${event.contactKey}`);
    }
    if (!Number.isFinite(event.timestamp)) {
      throw new InvalidEventError(contactKey, i, `timestamp is not a finite number`);
    }
    if (!Number.isFinite(event.charLength) || event.charLength < 0) {
      throw new InvalidEventError(contactKey, i, `charLength must be a non-negative number`);
    }
    if (event.wordCount !== undefined && (!Number.isFinite(event.wordCount) || event.wordCount < 0)) {
      throw new InvalidEventError(contactKey, i, `wordCount must be a non-negative number`);
    }
    if (event.direction !== "sent" && event.direction !== "received") {
      throw new InvalidEventError(contactKey, i, `unknown direction "${String(event.direction)}"`);
    }
    if (i > 0 && event.timestamp < events[i - 1].timestamp) {
      throw new InvalidEventOrderError(contactKey, i, events[i - 1].timestamp, event.timestamp);
    }
  }
}

/** Split a flat event list by contact, keeping each contact's order. */
export function groupByContact(events: readonly MessageEvent[]): Map<ContactKey, MessageEvent[]> {
  const grouped = new Map<ContactKey, MessageEvent[]>();
  for (const event of events) {
    const list = grouped.get(event.contactKey);
    if (list) {
      list.push(event);
    } else {
      grouped.set(event.contactKey, [event]);
    }
  }
  return grouped;
}

function isEventList(input: EngineInput): input is readonly MessageEvent[] {
  return Array.isArray(input);
}

/**
 * Group (if needed), validate, and re-key the input in code-unit order of
 * contact key so every downstream iteration is deterministic. Contacts with
 * no events are dropped.
 */
export function normalizeInput(input: EngineInput): EventsByContact {
  const grouped: EventsByContact = isEventList(input) ? groupByContact(input) : input;
  const keys = [...grouped.keys()].sort();

  const ordered = new Map<ContactKey, readonly MessageEvent[]>();
  for (const key of keys) {
    const events = grouped.get(key) ?? [];
    if (events.length === 0) continue;
    validateSequence(key, events);
    ordered.set(key, events);
  }
  return ordered;
}
