import { describe, it, expect } from "vitest";
import type { Schedule } from "@/lib/schedule-engine";
import { analyzeSchedule } from "@/lib/stats-engine";

describe("analyzeSchedule", () => {
  it("counts weeks per member and collects uncovered weeks", () => {
    const schedule: Schedule = [
      { week: 1, startDate: "2024-01-01", endDate: "2024-01-07", assignedTo: "A", hasHoliday: true, hasPatching: true },
      { week: 2, startDate: "2024-01-08", endDate: "2024-01-14", assignedTo: "B", hasHoliday: false, hasPatching: true },
      { week: 3, startDate: "2024-01-15", endDate: "2024-01-21", assignedTo: "UNASSIGNED", hasHoliday: true, hasPatching: false },
      { week: 4, startDate: "2024-01-22", endDate: "2024-01-28", assignedTo: "A", hasHoliday: false, hasPatching: false },
    ];

    expect(analyzeSchedule(schedule, ["A", "B", "C"])).toEqual({
      memberStats: {
        A: { weekCount: 2, holidayWeekCount: 1, patchingWeekCount: 1 },
        B: { weekCount: 1, holidayWeekCount: 0, patchingWeekCount: 1 },
        C: { weekCount: 0, holidayWeekCount: 0, patchingWeekCount: 0 },
      },
      uncoveredWeeks: ["2024-01-15"],
    });
  });
});
