import { describe, it, expect } from "vitest";
import { groupByContact, normalizeInput, validateSequence } from "../../src/engine/events.js";
import { InvalidEventError, InvalidEventOrderError } from "../../src/engine/errors.js";
import type { MessageEvent } from "../../src/engine/types.js";
import { ContactKey } from "../../src/utils/types.js";
import { at, makeEvent } from "../helpers/fixtures.js";

const alice = ContactKey.make("alice");

describe("groupByContact", () => {
  it("splits by contact and keeps each contact's order", () => {
    const events = [
      makeEvent("bob", at(1, 1, 9), "sent"),
      makeEvent("alice", at(1, 1, 10), "received"),
      makeEvent("bob", at(1, 1, 11), "received"),
    ];
    const grouped = groupByContact(events);
    expect([...grouped.keys()]).toEqual(["bob", "alice"]);
    expect(grouped.get(ContactKey.make("bob"))?.map((e) => e.timestamp)).toEqual([at(1, 1, 9), at(1, 1, 11)]);
  });
});

describe("validateSequence", () => {
  it("accepts equal timestamps", () => {
    const t = at(1, 1);
    expect(() =>
      validateSequence(alice, [makeEvent("alice", t, "sent"), makeEvent("alice", t, "received")]),
    ).not.toThrow();
  });

  it("fails fast on a decreasing timestamp", () => {
    const events = [
      makeEvent("alice", at(1, 2), "sent"),
      makeEvent("alice", at(1, 3), "sent"),
      makeEvent("alice", at(1, 1), "received"),
    ];
    try {
      validateSequence(alice, events);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidEventOrderError);
      const orderErr = err as InvalidEventOrderError;
      expect(orderErr.index).toBe(2);
      expect(orderErr.contactKey).toBe("alice");
      expect(orderErr.code).toBe("INVALID_EVENT_ORDER");
    }
  });

  it("rejects an event filed under another contact", () => {
    expect(() => validateSequence(alice, [makeEvent("bob", at(1, 1), "sent")])).toThrow(InvalidEventError);
  });

  it("rejects negative lengths and non-finite timestamps", () => {
    expect(() => validateSequence(alice, [makeEvent("alice", at(1, 1), "sent", { charLength: -1 })])).toThrow(
      "charLength must be a non-negative number",
    );
    expect(() => validateSequence(alice, [makeEvent("alice", Number.NaN, "sent")])).toThrow(
      "timestamp is not a finite number",
    );
    expect(() => validateSequence(alice, [makeEvent("alice", at(1, 1), "sent", { wordCount: -2 })])).toThrow(
      "wordCount must be a non-negative number",
    );
  });
});

describe("normalizeInput", () => {
  it("orders contacts by key and drops empty lists", () => {
    const input = new Map<ContactKey, readonly MessageEvent[]>([
      [ContactKey.make("zoe"), [makeEvent("zoe", at(1, 1), "sent")]],
      [ContactKey.make("empty"), []],
      [ContactKey.make("Adam"), [makeEvent("Adam", at(1, 1), "received")]],
      [ContactKey.make("adam"), [makeEvent("adam", at(1, 1), "received")]],
    ]);
    expect([...normalizeInput(input).keys()]).toEqual(["Adam", "adam", "zoe"]);
  });

  it("groups a flat list", () => {
    const normalized = normalizeInput([
      makeEvent("b", at(1, 1, 9), "sent"),
      makeEvent("a", at(1, 1, 10), "sent"),
    ]);
    expect([...normalized.keys()]).toEqual(["a", "b"]);
  });
});
