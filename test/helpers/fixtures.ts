import { vi } from "vitest";
import { Writable } from "node:stream";
import { parseEngineConfig } from "../../src/config/schema.js";
import type { EngineConfig } from "../../src/config/types.js";
import type { Direction, MessageEvent } from "../../src/engine/types.js";
import type { Logger } from "../../src/logging/logger.js";
import { ContactKey } from "../../src/utils/types.js";

/** Local-time timestamp; defaults to noon in 2025. */
export function at(month: number, day: number, hour = 12, minute = 0, second = 0, year = 2025): number {
  return new Date(year, month - 1, day, hour, minute, second).getTime();
}

export function makeEvent(
  contact: string,
  timestamp: number,
  direction: Direction,
  extra: Partial<Pick<MessageEvent, "charLength" | "hasEmoji" | "wordCount" | "emojis">> = {},
): MessageEvent {
  return {
    contactKey: ContactKey.make(contact),
    timestamp,
    direction,
    charLength: 10,
    ...extra,
  };
}

/** `count` events for one contact on one day, a minute apart, alternating direction. */
export function burst(contact: string, start: number, count: number, first: Direction = "sent"): MessageEvent[] {
  const events: MessageEvent[] = [];
  for (let i = 0; i < count; i++) {
    const flip = i % 2 === 1;
    const direction: Direction = flip ? (first === "sent" ? "received" : "sent") : first;
    events.push(makeEvent(contact, start + i * 60_000, direction));
  }
  return events;
}

export function makeEngineConfig(overrides: Record<string, unknown> = {}): EngineConfig {
  return parseEngineConfig(overrides);
}

export function makeLogger(): Logger {
  return {
    debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  } as unknown as Logger;
}

export function captureStream(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}
