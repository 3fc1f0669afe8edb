import fs from "fs";
import ExcelJS from "exceljs";
import type { Schedule } from "@/lib/schedule-engine";
import type { ScheduleStats } from "@/lib/stats-engine";
import { UNASSIGNED } from "@/lib/week-engine";

export const CSV_HEADER = ["Week", "Start Date", "End Date", "Assigned To", "Has Holiday", "Has Patching"] as const;

function yesNo(flag: boolean) {
  return flag ? "Yes" : "No";
}

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function renderTable(headers: readonly string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const line = (cells: readonly string[]) => cells.map((c, i) => c.padEnd(widths[i])).join(" | ").trimEnd();
  const rule = widths.map((w) => "-".repeat(w)).join("-+-");
  return [line(headers), rule, ...rows.map(line)].join("\n");
}

export function renderScheduleTable(schedule: Schedule): string {
  const headers = ["Week", "Start Date", "End Date", "Assigned To", "Holiday", "Patching"];
  const rows = schedule.map((w) => [
    String(w.week),
    w.startDate,
    w.endDate,
    w.assignedTo,
    yesNo(w.hasHoliday),
    yesNo(w.hasPatching),
  ]);
  return renderTable(headers, rows);
}

export function renderStatsTable(stats: ScheduleStats): string {
  const headers = ["Member", "Weeks", "Holiday Weeks", "Patching Weeks"];
  const rows = Object.entries(stats.memberStats).map(([member, s]) => [
    member,
    String(s.weekCount),
    String(s.holidayWeekCount),
    String(s.patchingWeekCount),
  ]);
  const table = renderTable(headers, rows);
  if (stats.uncoveredWeeks.length === 0) return table;
  return `${table}\n\n${UNASSIGNED} weeks: ${stats.uncoveredWeeks.join(", ")}`;
}

export function scheduleToCsv(schedule: Schedule): string {
  const lines = [CSV_HEADER.join(",")];
  for (const w of schedule) {
    lines.push(
      [
        String(w.week),
        w.startDate,
        w.endDate,
        csvField(w.assignedTo),
        w.hasHoliday ? "True" : "False",
        w.hasPatching ? "True" : "False",
      ].join(",")
    );
  }
  return `${lines.join("\n")}\n`;
}

export function writeScheduleCsv(schedule: Schedule, file: string): void {
  fs.writeFileSync(file, scheduleToCsv(schedule), "utf-8");
}

export function buildScheduleWorkbook(schedule: Schedule, stats: ScheduleStats): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();

  // Tab 1: On-Call Schedule
  const scheduleSheet = workbook.addWorksheet("On-Call Schedule");
  scheduleSheet.columns = [
    { header: "Week", key: "week", width: 8 },
    { header: "Start Date", key: "startDate", width: 12 },
    { header: "End Date", key: "endDate", width: 12 },
    { header: "Assigned To", key: "assignedTo", width: 20 },
    { header: "Has Holiday", key: "hasHoliday", width: 12 },
    { header: "Has Patching", key: "hasPatching", width: 12 },
  ];
  scheduleSheet.getRow(1).font = { bold: true };
  scheduleSheet.getRow(1).fill = { type: "pattern", pattern: "solid", fgColor: { argb: "E2E8F0" } };

  for (const w of schedule) {
    const row = scheduleSheet.addRow({
      week: w.week,
      startDate: w.startDate,
      endDate: w.endDate,
      assignedTo: w.assignedTo,
      hasHoliday: yesNo(w.hasHoliday),
      hasPatching: yesNo(w.hasPatching),
    });
    if (w.assignedTo === UNASSIGNED) {
      row.getCell("assignedTo").font = { bold: true, color: { argb: "FFB91C1C" } };
    }
  }

  // Tab 2: On-Call Statistics
  const statsSheet = workbook.addWorksheet("On-Call Statistics");
  statsSheet.columns = [
    { header: "Member", key: "member", width: 20 },
    { header: "Weeks", key: "weeks", width: 10 },
    { header: "Holiday Weeks", key: "holidayWeeks", width: 15 },
    { header: "Patching Weeks", key: "patchingWeeks", width: 15 },
  ];
  statsSheet.getRow(1).font = { bold: true };
  statsSheet.getRow(1).fill = { type: "pattern", pattern: "solid", fgColor: { argb: "E2E8F0" } };

  for (const [member, s] of Object.entries(stats.memberStats)) {
    statsSheet.addRow({
      member,
      weeks: s.weekCount,
      holidayWeeks: s.holidayWeekCount,
      patchingWeeks: s.patchingWeekCount,
    });
  }

  return workbook;
}

export async function writeScheduleWorkbook(schedule: Schedule, stats: ScheduleStats, file: string): Promise<void> {
  const workbook = buildScheduleWorkbook(schedule, stats);
  await workbook.xlsx.writeFile(file);
}
