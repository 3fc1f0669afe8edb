import { describe, it, expect } from "vitest";
import {
  buildScheduleWorkbook,
  renderScheduleTable,
  renderStatsTable,
  scheduleToCsv,
} from "@/lib/export-engine";
import type { Schedule } from "@/lib/schedule-engine";
import { analyzeSchedule } from "@/lib/stats-engine";

const schedule: Schedule = [
  { week: 1, startDate: "2024-01-01", endDate: "2024-01-07", assignedTo: "Alice", hasHoliday: true, hasPatching: false },
  { week: 2, startDate: "2024-01-08", endDate: "2024-01-14", assignedTo: "UNASSIGNED", hasHoliday: false, hasPatching: true },
];

describe("scheduleToCsv", () => {
  it("writes the header and one row per week", () => {
    expect(scheduleToCsv(schedule)).toBe(
      "Week,Start Date,End Date,Assigned To,Has Holiday,Has Patching\n" +
        "1,2024-01-01,2024-01-07,Alice,True,False\n" +
        "2,2024-01-08,2024-01-14,UNASSIGNED,False,True\n"
    );
  });

  it("quotes names containing commas or quotes", () => {
    const csv = scheduleToCsv([
      { ...schedule[0], assignedTo: "Smith, Jo" },
      { ...schedule[0], week: 2, assignedTo: 'Jo "JJ" Smith' },
    ]);
    const lines = csv.split("\n");
    expect(lines[1]).toBe('1,2024-01-01,2024-01-07,"Smith, Jo",True,False');
    expect(lines[2]).toBe('2,2024-01-01,2024-01-07,"Jo ""JJ"" Smith",True,False');
  });

  it("writes only the header for an empty schedule", () => {
    expect(scheduleToCsv([])).toBe("Week,Start Date,End Date,Assigned To,Has Holiday,Has Patching\n");
  });
});

describe("renderScheduleTable", () => {
  it("aligns columns to the widest cell", () => {
    expect(renderScheduleTable(schedule).split("\n")).toEqual([
      "Week | Start Date | End Date   | Assigned To | Holiday | Patching",
      "-----+------------+------------+-------------+---------+---------",
      "1    | 2024-01-01 | 2024-01-07 | Alice       | Yes     | No",
      "2    | 2024-01-08 | 2024-01-14 | UNASSIGNED  | No      | Yes",
    ]);
  });
});

describe("renderStatsTable", () => {
  it("lists every member and the uncovered weeks", () => {
    const stats = analyzeSchedule(schedule, ["Alice", "Bob"]);
    expect(renderStatsTable(stats).split("\n")).toEqual([
      "Member | Weeks | Holiday Weeks | Patching Weeks",
      "-------+-------+---------------+---------------",
      "Alice  | 1     | 1             | 0",
      "Bob    | 0     | 0             | 0",
      "",
      "UNASSIGNED weeks: 2024-01-08",
    ]);
  });
});

describe("buildScheduleWorkbook", () => {
  it("writes a schedule sheet and a statistics sheet", () => {
    const workbook = buildScheduleWorkbook(schedule, analyzeSchedule(schedule, ["Alice", "Bob"]));

    const scheduleSheet = workbook.getWorksheet("On-Call Schedule");
    expect(scheduleSheet?.rowCount).toBe(3);
    expect(scheduleSheet?.getRow(1).getCell(4).value).toBe("Assigned To");
    expect(scheduleSheet?.getRow(2).getCell(4).value).toBe("Alice");
    expect(scheduleSheet?.getRow(2).getCell(5).value).toBe("Yes");
    expect(scheduleSheet?.getRow(3).getCell(4).value).toBe("UNASSIGNED");

    const statsSheet = workbook.getWorksheet("On-Call Statistics");
    expect(statsSheet?.rowCount).toBe(3);
    const alice = statsSheet?.getRow(2);
    expect([1, 2, 3, 4].map((col) => alice?.getCell(col).value)).toEqual(["Alice", 1, 1, 0]);
  });
});
