import { addDays } from "date-fns";
import {
  getWeekStart,
  getWeekWindow,
  toISODate,
  weekHasHoliday,
  weekHasPatching,
  type CalendarSet,
} from "@/lib/calendar-engine";
import { ScheduleConfigError } from "@/lib/errors";
import { createFairnessTracker, type FairnessTracker } from "@/lib/fairness-engine";
import { createRotationCursor, type RotationCursor } from "@/lib/rotation-cursor";
import { assignWeek, UNASSIGNED } from "@/lib/week-engine";

export type WeekAssignment = {
  week: number; // 1-based
  startDate: string; // ISO Monday
  endDate: string; // ISO Sunday
  assignedTo: string; // member name or UNASSIGNED
  hasHoliday: boolean;
  hasPatching: boolean;
};

export type Schedule = WeekAssignment[];

export type ScheduleBuildResult = {
  schedule: Schedule;
  fairness: FairnessTracker;
  cursor: RotationCursor;
  uncovered: string[]; // start dates of UNASSIGNED weeks
  success: boolean;
};

export function buildSchedule(
  roster: readonly string[],
  startDate: Date,
  numWeeks: number,
  calendar: CalendarSet
): ScheduleBuildResult {
  if (roster.length === 0) {
    throw new ScheduleConfigError("Team roster is empty; add at least one member");
  }
  if (!Number.isInteger(numWeeks) || numWeeks < 0) {
    throw new ScheduleConfigError(`Number of weeks must be a non-negative integer (got ${numWeeks})`);
  }
  if (isNaN(startDate.getTime())) {
    throw new ScheduleConfigError("Start date is not a valid date");
  }

  const state = {
    calendar,
    fairness: createFairnessTracker(roster),
    cursor: createRotationCursor(roster),
  };
  const schedule: Schedule = [];
  const uncovered: string[] = [];

  let current = getWeekStart(startDate);
  for (let week = 1; week <= numWeeks; week++) {
    const window = getWeekWindow(current);
    const hasHoliday = weekHasHoliday(calendar, window);
    const hasPatching = weekHasPatching(calendar, window);

    const decision = assignWeek({ window, hasHoliday, hasPatching }, state);
    const startISO = toISODate(window.start);

    if (decision.assignedTo === UNASSIGNED) {
      uncovered.push(startISO);
      const reasons = decision.rejections.map((r) => `${r.member}: ${r.reason}`).join("; ");
      console.warn(`Week ${week} (${startISO}) left ${UNASSIGNED} - ${reasons}`);
    }

    schedule.push({
      week,
      startDate: startISO,
      endDate: toISODate(window.end),
      assignedTo: decision.assignedTo,
      hasHoliday,
      hasPatching,
    });

    current = addDays(current, 7);
  }

  console.log(`Scheduled ${schedule.length - uncovered.length} of ${schedule.length} weeks (${uncovered.length} uncovered)`);

  return {
    schedule,
    fairness: state.fairness,
    cursor: state.cursor,
    uncovered,
    success: uncovered.length === 0,
  };
}
