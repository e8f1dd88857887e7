import { describe, expect, test, vi } from "vitest";
import { ChangeDetector } from "../src/services/change-detector.js";
import { InMemoryObservationStore } from "../src/services/observation-store.js";
import { makeObservation } from "./stubs.js";

const NOW = Date.parse("2026-03-01T09:00:00.000Z");

async function detectAfter(baseline: number | null, current: number | null) {
  const store = new InMemoryObservationStore();
  const detector = new ChangeDetector({ store, nowFn: () => NOW });
  await store.save(makeObservation("k", "d.com", baseline, "2026-03-01T08:00:00.000Z"));
  const observation = makeObservation("k", "d.com", current, "2026-03-01T09:00:00.000Z");
  await store.save(observation);
  return detector.detectChange("k", "d.com", observation);
}

describe("ChangeDetector", () => {
  test("cold start never reports a change", async () => {
    const store = new InMemoryObservationStore();
    const detector = new ChangeDetector({ store });
    const listener = vi.fn();
    detector.onChange(listener);
    const observation = makeObservation("k", "d.com", 3, "2026-03-01T08:00:00.000Z");
    await store.save(observation);

    await expect(detector.detectChange("k", "d.com", observation)).resolves.toBeNull();
    expect(listener).not.toHaveBeenCalled();
  });

  test("equal positions produce no event", async () => {
    await expect(detectAfter(5, 5)).resolves.toBeNull();
    await expect(detectAfter(null, null)).resolves.toBeNull();
  });

  test("a moved position produces an event", async () => {
    await expect(detectAfter(5, 7)).resolves.toEqual({
      keyword: "k",
      domain: "d.com",
      previousPosition: 5,
      currentPosition: 7,
      detectedAt: "2026-03-01T09:00:00.000Z",
    });
  });

  test("appearing and dropping out both count as changes", async () => {
    await expect(detectAfter(null, 3)).resolves.toMatchObject({ previousPosition: null, currentPosition: 3 });
    await expect(detectAfter(3, null)).resolves.toMatchObject({ previousPosition: 3, currentPosition: null });
  });

  test("only the last registered listener is called", async () => {
    const store = new InMemoryObservationStore();
    const detector = new ChangeDetector({ store, nowFn: () => NOW });
    const first = vi.fn();
    const second = vi.fn();
    detector.onChange(first);
    detector.onChange(second);

    await store.save(makeObservation("k", "d.com", 2, "2026-03-01T08:00:00.000Z"));
    const current = makeObservation("k", "d.com", 1, "2026-03-01T09:00:00.000Z");
    await store.save(current);
    const event = await detector.detectChange("k", "d.com", current);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledWith(event);
  });

  test("a throwing listener does not hide the event", async () => {
    const store = new InMemoryObservationStore();
    const detector = new ChangeDetector({ store, nowFn: () => NOW });
    detector.onChange(() => {
      throw new Error("listener bug");
    });

    await store.save(makeObservation("k", "d.com", 2, "2026-03-01T08:00:00.000Z"));
    const current = makeObservation("k", "d.com", 9, "2026-03-01T09:00:00.000Z");
    await store.save(current);

    await expect(detector.detectChange("k", "d.com", current)).resolves.toMatchObject({
      previousPosition: 2,
      currentPosition: 9,
    });
  });
});
