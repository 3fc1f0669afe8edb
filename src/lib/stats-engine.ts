import type { Schedule } from "@/lib/schedule-engine";
import { UNASSIGNED } from "@/lib/week-engine";

export type MemberStats = {
  weekCount: number;
  holidayWeekCount: number;
  patchingWeekCount: number;
};

export type ScheduleStats = {
  memberStats: Record<string, MemberStats>;
  uncoveredWeeks: string[]; // start dates
};

export function analyzeSchedule(schedule: Schedule, roster: readonly string[]): ScheduleStats {
  const memberStats: Record<string, MemberStats> = {};
  const uncoveredWeeks: string[] = [];

  // Initialize stats
  for (const member of roster) {
    memberStats[member] = { weekCount: 0, holidayWeekCount: 0, patchingWeekCount: 0 };
  }

  for (const week of schedule) {
    if (week.assignedTo === UNASSIGNED) {
      uncoveredWeeks.push(week.startDate);
      continue;
    }
    const stats = memberStats[week.assignedTo];
    if (!stats) continue;
    stats.weekCount += 1;
    if (week.hasHoliday) stats.holidayWeekCount += 1;
    if (week.hasPatching) stats.patchingWeekCount += 1;
  }

  return { memberStats, uncoveredWeeks };
}
