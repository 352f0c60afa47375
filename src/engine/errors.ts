import type { ContactKey } from "../utils/types.js";

export type EngineErrorCode = "INSUFFICIENT_DATA" | "INVALID_EVENT_ORDER" | "INVALID_EVENT";

/**
 * Base class for engine failures. Carries enough context
 * (contact, metric) for a caller to report and skip.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly contactKey: ContactKey | null;
  readonly metric: string | null;

  constructor(
    message: string,
    code: EngineErrorCode,
    contactKey: ContactKey | null = null,
    metric: string | null = null,
  ) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.contactKey = contactKey;
    this.metric = metric;
  }
}

/**
 * Too few events for one metric. The contact (or the dataset, when
 * contactKey is null) is left out of that metric only.
 */
export class InsufficientDataError extends EngineError {
  readonly reason: string;

  constructor(metric: string, reason: string, contactKey: ContactKey | null = null) {
    const subject = contactKey ? `contact ${contactKey}` : "dataset";
    super(`Insufficient data for ${metric} (${subject}): ${reason}`, "INSUFFICIENT_DATA", contactKey, metric);
    this.name = "InsufficientDataError";
    this.reason = reason;
  }
}

/**
 * An event is earlier than the one before it within the same contact.
 */
export class InvalidEventOrderError extends EngineError {
  readonly index: number;

  constructor(contactKey: ContactKey, index: number, previous: number, current: number) {
    super(
      `Events for contact ${contactKey} are out of order at index ${index}: ${current} < ${previous}`,
      "INVALID_EVENT_ORDER",
      contactKey,
    );
    this.name = "InvalidEventOrderError";
    this.index = index;
  }
}

export class InvalidEventError extends EngineError {
  readonly index: number;

  constructor(contactKey: ContactKey, index: number, problem: string) {
    super(`Invalid event for contact ${contactKey} at index ${index}: ${problem}`, "INVALID_EVENT", contactKey);
    this.name = "InvalidEventError";
    this.index = index;
  }
}
