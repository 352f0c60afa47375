import { describe, it, expect } from "vitest";
import { compute, MetricsEngine } from "../../src/engine/compute.js";
import { InvalidEventOrderError } from "../../src/engine/errors.js";
import type { MessageEvent } from "../../src/engine/types.js";
import { ContactKey } from "../../src/utils/types.js";
import { at, burst, makeEngineConfig, makeEvent, makeLogger } from "../helpers/fixtures.js";

function scenario(): { a: MessageEvent[]; b: MessageEvent[]; c: MessageEvent[] } {
  return {
    a: [...burst("A", at(1, 1, 10), 25), ...burst("A", at(3, 31, 10), 25)],
    b: [...burst("B", at(1, 10, 10), 5), ...burst("B", at(3, 20, 10), 40)],
    c: [...burst("C", at(1, 15, 10), 40), ...burst("C", at(3, 25, 10), 2)],
  };
}

describe("compute", () => {
  it("returns an empty bundle for no events", () => {
    const bundle = compute([]);

    expect(bundle.totals).toEqual({
      messages: 0,
      sent: 0,
      received: 0,
      contacts: 0,
      lateNight: 0,
      lateNightFraction: null,
      firstTimestamp: null,
      lastTimestamp: null,
      charsSent: 0,
      emojiSent: 0,
      wordsSent: 0,
    });
    expect(bundle.contacts).toEqual({});
    expect(bundle.latency.global).toEqual({ samples: 0, outliers: 0, overall: null, you: null, them: null });
    expect(bundle.trend).toEqual({ windows: null, byContact: {} });
    expect(bundle.skew).toEqual({ initiationRatio: null, byContact: {} });
    expect(bundle.personality.id).toBe("steady_texter");
    expect(Object.values(bundle.rankings).every((r) => r.length === 0)).toBe(true);
    expect(bundle.exclusions).toEqual([]);
  });

  it("classifies the three-contact trend scenario", () => {
    const { a, b, c } = scenario();
    const bundle = compute([...a, ...b, ...c]);

    expect(bundle.totals.messages).toBe(137);
    expect(bundle.trend.windows?.days).toBe(90);
    expect(bundle.trend.windows?.windowDays).toBe(30);
    expect(bundle.trend.byContact["A"]?.classification).toBe("stable");
    expect(bundle.trend.byContact["B"]?.classification).toBe("heating_up");
    expect(bundle.trend.byContact["C"]?.classification).toBe("ghosted");
    expect(bundle.rankings.heatingUp).toEqual([{ rank: 1, contactKey: "B", value: 35 }]);
    expect(bundle.rankings.ghosted).toEqual([{ rank: 1, contactKey: "C", value: 40 }]);
    expect(bundle.rankings.topContacts.map((r) => r.contactKey)).toEqual(["A", "B", "C"]);
    expect(bundle.exclusions).toEqual([]);
  });

  it("produces identical output regardless of contact order", () => {
    const { a, b, c } = scenario();
    const forward = compute([...a, ...b, ...c]);
    const backward = compute([...c, ...b, ...a]);

    expect(JSON.stringify(backward)).toBe(JSON.stringify(forward));
    expect(Object.keys(backward.contacts)).toEqual(["A", "B", "C"]);
  });

  it("accepts events already grouped by contact", () => {
    const { a, b } = scenario();
    const grouped = new Map([
      [ContactKey.make("B"), b],
      [ContactKey.make("A"), a],
    ]);
    expect(JSON.stringify(compute(grouped))).toBe(JSON.stringify(compute([...a, ...b])));
  });

  it("handles a send-only contact and records its latency exclusion", () => {
    const solo = Array.from({ length: 10 }, (_, i) => makeEvent("solo", at(2, 10, 10, i), "sent"));
    const pal = [...burst("pal", at(1, 1, 10), 10), ...burst("pal", at(3, 31, 10), 10)];
    const bundle = compute([...pal, ...solo]);

    expect(bundle.skew.byContact["solo"]).toMatchObject({
      sentRatio: 1,
      sessions: 1,
      initiatorDirection: "sent",
    });
    expect(bundle.trend.byContact["solo"]).toMatchObject({
      earlyWindowCount: 0,
      lateWindowCount: 0,
      classification: "stable",
    });
    expect(Object.keys(bundle.latency.byContact)).toEqual(["pal"]);
    expect(bundle.exclusions).toEqual([{ contactKey: "solo", metric: "latency", reason: "no direction flips" }]);
  });

  it("excludes a contact whose every reply exceeds the delay cap", () => {
    const bundle = compute([makeEvent("slow", at(5, 1, 10), "sent"), makeEvent("slow", at(5, 3, 10), "received")]);

    expect(bundle.latency.global.outliers).toBe(1);
    expect(bundle.exclusions).toEqual([
      { contactKey: "slow", metric: "latency", reason: "all 1 replies exceed the delay cap" },
    ]);
  });

  it("skips trend windows for a single-day dataset", () => {
    const bundle = compute(burst("x", at(5, 1, 10), 6));

    expect(bundle.trend.windows).toBeNull();
    expect(bundle.trend.byContact["x"]?.classification).toBe("stable");
    expect(bundle.exclusions).toEqual([
      { contactKey: null, metric: "trend", reason: "observed range covers 1 day(s), need at least 2" },
    ]);
  });

  it("keeps a contact keyed __proto__ as an ordinary entry", () => {
    const bundle = compute([...burst("__proto__", at(1, 1, 10), 4), ...burst("x", at(1, 2, 10), 4)]);

    expect(bundle.totals.contacts).toBe(2);
    expect(Object.keys(bundle.contacts)).toEqual(["__proto__", "x"]);
    expect(Object.keys(bundle.latency.byContact)).toEqual(["__proto__", "x"]);
    expect(Object.keys(bundle.trend.byContact)).toEqual(["__proto__", "x"]);
    expect(Object.keys(bundle.skew.byContact)).toEqual(["__proto__", "x"]);
    expect(Object.getPrototypeOf(bundle.contacts)).toBe(Object.prototype);
    expect(Object.keys(JSON.parse(JSON.stringify(bundle)).contacts)).toEqual(["__proto__", "x"]);
  });

  it("ranks a contact who opens every session as down bad", () => {
    const events: MessageEvent[] = [];
    for (let day = 1; day <= 30; day++) {
      events.push(
        makeEvent("w", at(1, day, 10, 0), "received"),
        makeEvent("w", at(1, day, 10, 1), "sent"),
        makeEvent("w", at(1, day, 10, 2), "sent"),
      );
    }
    const bundle = compute(events);

    expect(bundle.skew.byContact["w"]).toMatchObject({ sessions: 30, sentOpeners: 0, receivedOpeners: 30 });
    expect(bundle.rankings.downBad).toEqual([{ rank: 1, contactKey: "w", value: 30 }]);
    expect(bundle.rankings.theyTextFirst).toEqual([{ rank: 1, contactKey: "w", value: 1 }]);
    expect(bundle.rankings.simps).toEqual([]);
  });

  it("rejects out-of-order events", () => {
    const events = [makeEvent("x", at(1, 2), "sent"), makeEvent("x", at(1, 1), "received")];
    expect(() => compute(events)).toThrow(InvalidEventOrderError);
  });

  it("computes the global initiation ratio across contacts", () => {
    const events = [
      makeEvent("p", at(6, 1, 9), "sent"),
      makeEvent("p", at(6, 2, 9), "sent"),
      makeEvent("q", at(6, 1, 9), "received"),
      makeEvent("q", at(6, 3, 9), "sent"),
    ];
    expect(compute(events).skew.initiationRatio).toBe(0.75);
  });
});

describe("MetricsEngine", () => {
  it("logs a summary of each run", () => {
    const logger = makeLogger();
    const { a, b, c } = scenario();
    new MetricsEngine(makeEngineConfig(), logger).compute([...a, ...b, ...c]);

    expect(logger.debug).toHaveBeenCalledWith({ contacts: 3, messages: 137 }, "Aggregated events");
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ contacts: 3, messages: 137, exclusions: 0 }),
      "Metrics computed",
    );
  });

  it("honours the configured night window", () => {
    const events = [makeEvent("n", at(7, 1, 23, 30), "sent"), makeEvent("n", at(7, 2, 1), "received")];
    const bundle = new MetricsEngine(
      makeEngineConfig({ nightWindow: { start: "23:00", end: "02:00" } }),
      makeLogger(),
    ).compute(events);

    expect(bundle.totals.lateNight).toBe(2);
    expect(bundle.contacts["n"]?.lateNightCount).toBe(2);
  });
});
