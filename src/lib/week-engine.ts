import { memberAvailableForWeek, type CalendarSet, type WeekWindow } from "@/lib/calendar-engine";
import {
  getHolidayCount,
  getMinPatchingCount,
  getPatchingCount,
  recordAssignment,
  type FairnessTracker,
} from "@/lib/fairness-engine";
import { advanceCursor, memberAt, peekCandidate, type RotationCursor } from "@/lib/rotation-cursor";

export const UNASSIGNED = "UNASSIGNED" as const;

export const MAX_HOLIDAY_WEEKS_PER_MEMBER = 1;

export type WeekContext = {
  window: WeekWindow;
  hasHoliday: boolean;
  hasPatching: boolean;
};

export type WeekState = {
  calendar: CalendarSet;
  fairness: FairnessTracker;
  cursor: RotationCursor;
};

export type Rejection = {
  member: string;
  reason: string;
};

export type WeekDecision = {
  assignedTo: string; // member name or UNASSIGNED
  rejections: Rejection[];
};

function underHolidayCap(fairness: FairnessTracker, member: string): boolean {
  return getHolidayCount(fairness, member) < MAX_HOLIDAY_WEEKS_PER_MEMBER;
}

/**
 * Looks for any member at the patching floor who could also take this week.
 * `from` is a plain copy of the cursor index; the live cursor is never touched.
 */
export function hasFairerAlternative(
  roster: readonly string[],
  from: number,
  week: WeekContext,
  calendar: CalendarSet,
  fairness: FairnessTracker,
  minPatching: number
): boolean {
  for (let offset = 0; offset < roster.length; offset++) {
    const other = memberAt(roster, from + offset);
    if (getPatchingCount(fairness, other) !== minPatching) continue;
    if (!memberAvailableForWeek(calendar, other, week.window)) continue;
    if (week.hasHoliday && !underHolidayCap(fairness, other)) continue;
    return true;
  }
  return false;
}

export function checkCandidate(
  candidate: string,
  week: WeekContext,
  state: WeekState,
  minPatching: number
): { eligible: boolean; reason?: string } {
  const { calendar, fairness, cursor } = state;

  if (!memberAvailableForWeek(calendar, candidate, week.window)) {
    return { eligible: false, reason: "Unavailable during the week" };
  }

  if (week.hasHoliday && !underHolidayCap(fairness, candidate)) {
    return { eligible: false, reason: "Already covered a holiday week" };
  }

  if (week.hasPatching && getPatchingCount(fairness, candidate) > minPatching) {
    if (hasFairerAlternative(cursor.roster, cursor.index, week, calendar, fairness, minPatching)) {
      return { eligible: false, reason: "A member with fewer patching weeks can take this week" };
    }
  }

  return { eligible: true };
}

/**
 * Walks the rotation for one week. Every attempt advances the cursor, accepted or not,
 * so an uncovered week leaves it exactly one full lap further on.
 */
export function assignWeek(week: WeekContext, state: WeekState): WeekDecision {
  const { fairness, cursor } = state;
  const minPatching = getMinPatchingCount(fairness);
  const rejections: Rejection[] = [];

  for (let attempt = 0; attempt < cursor.roster.length; attempt++) {
    const candidate = peekCandidate(cursor);
    const check = checkCandidate(candidate, week, state, minPatching);

    if (check.eligible) {
      recordAssignment(fairness, candidate, week.hasHoliday, week.hasPatching);
      advanceCursor(cursor);
      return { assignedTo: candidate, rejections };
    }

    rejections.push({ member: candidate, reason: check.reason ?? "Not eligible" });
    advanceCursor(cursor);
  }

  return { assignedTo: UNASSIGNED, rejections };
}
