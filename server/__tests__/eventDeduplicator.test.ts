import { describe, it, expect } from "vitest";
import { EventDeduplicator } from "../services/eventDeduplicator";

describe("EventDeduplicator", () => {
  it("returns false on first sight and true on every repeat", () => {
    const dedupe = new EventDeduplicator({});

    expect(dedupe.seen("Ev1")).toBe(false);
    expect(dedupe.seen("Ev1")).toBe(true);
    expect(dedupe.seen("Ev1")).toBe(true);
    expect(dedupe.seen("Ev2")).toBe(false);
    expect(dedupe.size).toBe(2);
  });

  it("accepts exactly one of many concurrent deliveries", async () => {
    const dedupe = new EventDeduplicator();

    const results = await Promise.all(
      Array.from({ length: 25 }, () => Promise.resolve().then(() => dedupe.seen("EvConcurrent"))),
    );

    expect(results.filter((duplicate) => !duplicate)).toHaveLength(1);
    expect(results.filter((duplicate) => duplicate)).toHaveLength(24);
  });

  it("forgets ids once the TTL has passed", () => {
    let now = 1_000;
    const dedupe = new EventDeduplicator({ ttlMs: 500, now: () => now });

    expect(dedupe.seen("Ev1")).toBe(false);
    now = 1_400;
    expect(dedupe.seen("Ev1")).toBe(true);
    now = 1_501;
    expect(dedupe.seen("Ev1")).toBe(false);
  });

  it("evicts expired ids of other events on access", () => {
    let now = 0;
    const dedupe = new EventDeduplicator({ ttlMs: 100, now: () => now });

    dedupe.seen("Ev1");
    dedupe.seen("Ev2");
    now = 150;
    dedupe.seen("Ev3");

    expect(dedupe.size).toBe(1);
  });

  it("drops the oldest ids past maxEntries", () => {
    const dedupe = new EventDeduplicator({ maxEntries: 2 });

    dedupe.seen("Ev1");
    dedupe.seen("Ev2");
    dedupe.seen("Ev3");

    expect(dedupe.size).toBe(2);
    expect(dedupe.seen("Ev3")).toBe(true);
    expect(dedupe.seen("Ev2")).toBe(true);
    expect(dedupe.seen("Ev1")).toBe(false);
  });

  it("keeps ids for the process lifetime when no bounds are given", () => {
    let now = 0;
    const dedupe = new EventDeduplicator({ now: () => now });

    dedupe.seen("Ev1");
    now = 365 * 24 * 60 * 60 * 1000;
    expect(dedupe.seen("Ev1")).toBe(true);
  });

  it("rejects a maxEntries below 1", () => {
    expect(() => new EventDeduplicator({ maxEntries: 0 })).toThrow("maxEntries must be at least 1");
  });
});
