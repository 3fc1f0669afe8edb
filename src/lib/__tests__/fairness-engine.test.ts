import { describe, it, expect } from "vitest";
import {
  createFairnessTracker,
  getHolidayCount,
  getMinPatchingCount,
  getPatchingCount,
  recordAssignment,
} from "@/lib/fairness-engine";

describe("FairnessTracker", () => {
  it("starts every roster member at zero", () => {
    const tracker = createFairnessTracker(["Alice", "Bob"]);
    expect(getHolidayCount(tracker, "Alice")).toBe(0);
    expect(getPatchingCount(tracker, "Bob")).toBe(0);
    expect(tracker.patchingCounts.size).toBe(2);
  });

  it("reads zero for a name it has never seen", () => {
    const tracker = createFairnessTracker(["Alice"]);
    expect(getHolidayCount(tracker, "Zed")).toBe(0);
    expect(getPatchingCount(tracker, "Zed")).toBe(0);
  });

  it("increments only the flagged counters", () => {
    const tracker = createFairnessTracker(["Alice", "Bob"]);
    recordAssignment(tracker, "Alice", true, false);
    recordAssignment(tracker, "Bob", false, true);
    recordAssignment(tracker, "Bob", false, false);
    expect(getHolidayCount(tracker, "Alice")).toBe(1);
    expect(getPatchingCount(tracker, "Alice")).toBe(0);
    expect(getHolidayCount(tracker, "Bob")).toBe(0);
    expect(getPatchingCount(tracker, "Bob")).toBe(1);
  });

  it("takes the patching floor across the whole roster", () => {
    const tracker = createFairnessTracker(["Alice", "Bob", "Carol"]);
    recordAssignment(tracker, "Alice", false, true);
    recordAssignment(tracker, "Bob", false, true);
    expect(getMinPatchingCount(tracker)).toBe(0);
    recordAssignment(tracker, "Carol", false, true);
    expect(getMinPatchingCount(tracker)).toBe(1);
  });

  it("shares counters between duplicate roster entries", () => {
    const tracker = createFairnessTracker(["Alice", "Alice", "Bob"]);
    expect(tracker.holidayCounts.size).toBe(2);
  });
});
