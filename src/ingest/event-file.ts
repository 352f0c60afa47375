import { readFileSync } from "node:fs";
import { z } from "zod";
import type { MessageEvent } from "../engine/types.js";
import { ContactKey } from "../utils/types.js";

// One pictograph with optional variation selector or skin tone, joined by ZWJ
const EMOJI_PATTERN =
  /\p{Extended_Pictographic}(?:\uFE0F|\p{Emoji_Modifier})?(?:\u200D\p{Extended_Pictographic}(?:\uFE0F|\p{Emoji_Modifier})?)*/gu;

// Tapback reactions exported as text ("Loved “see you soon”")
const REACTION_PATTERN = /^(?:Loved|Liked|Disliked|Laughed at|Emphasized|Questioned) [“"]/;

const timestampSchema = z.union([
  z.number().finite(),
  z
    .string()
    .refine((s) => !Number.isNaN(Date.parse(s)), "not a parseable date")
    .transform((s) => Date.parse(s)),
]);

/**
 * One row of an exported message log. Either `text` or the explicit
 * fields supply length, word count and emoji; explicit fields win.
 */
export const rawEventSchema = z.object({
  contact: z.string().min(1),
  timestamp: timestampSchema,
  direction: z.enum(["sent", "received"]),
  text: z.string().optional(),
  charLength: z.number().int().min(0).optional(),
  wordCount: z.number().int().min(0).optional(),
  hasEmoji: z.boolean().optional(),
  emojis: z.array(z.string().min(1)).optional(),
});

export type RawEvent = z.infer<typeof rawEventSchema>;

/** Whitespace-separated words; reactions and blank messages count zero. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed === "" || REACTION_PATTERN.test(trimmed)) return 0;
  return trimmed.split(/\s+/).length;
}

export function extractEmojis(text: string): string[] {
  return [...new Set(text.match(EMOJI_PATTERN) ?? [])];
}

export function toMessageEvent(raw: RawEvent): MessageEvent {
  const { text } = raw;
  const charLength = raw.charLength ?? (text !== undefined ? Array.from(text).length : 0);
  const wordCount = raw.wordCount ?? (text !== undefined ? countWords(text) : undefined);
  const emojis = raw.emojis ?? (text !== undefined ? extractEmojis(text) : undefined);
  const hasEmoji = raw.hasEmoji ?? (emojis !== undefined ? emojis.length > 0 : undefined);

  return {
    contactKey: ContactKey.make(raw.contact),
    timestamp: raw.timestamp,
    direction: raw.direction,
    charLength,
    ...(hasEmoji !== undefined ? { hasEmoji } : {}),
    ...(wordCount !== undefined ? { wordCount } : {}),
    ...(emojis !== undefined ? { emojis } : {}),
  };
}

function parseRow(value: unknown, where: string): MessageEvent {
  const result = rawEventSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".") || "row";
    throw new Error(`Invalid event at ${where}: ${path}: ${issue?.message ?? "invalid"}`);
  }
  return toMessageEvent(result.data);
}

/**
 * Parse a JSON array or newline-delimited JSON of raw events and
 * return them ordered by timestamp (stable for equal timestamps).
 */
export function parseEvents(content: string): MessageEvent[] {
  const trimmed = content.trim();
  if (trimmed === "") return [];

  const events: MessageEvent[] = [];

  if (trimmed.startsWith("[")) {
    const rows = JSON.parse(trimmed) as unknown;
    if (!Array.isArray(rows)) {
      throw new Error("Event file must contain a JSON array or one JSON object per line");
    }
    rows.forEach((row: unknown, i) => events.push(parseRow(row, `index ${i}`)));
  } else {
    const lines = trimmed.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line === "") continue;
      let row: unknown;
      try {
        row = JSON.parse(line);
      } catch (err) {
        throw new Error(`Invalid JSON at line ${i + 1}: ${err instanceof Error ? err.message : String(err)}`);
      }
      events.push(parseRow(row, `line ${i + 1}`));
    }
  }

  return events.sort((a, b) => a.timestamp - b.timestamp);
}

export function loadEvents(path: string): MessageEvent[] {
  return parseEvents(readFileSync(path, "utf-8"));
}
