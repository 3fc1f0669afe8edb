import { addDays, format, startOfWeek } from "date-fns";

export type DateSet = ReadonlySet<string>; // ISO YYYY-MM-DD

export type UnavailabilityIndex = ReadonlyMap<string, DateSet>; // member -> days off

export type WeekWindow = {
  start: Date; // Monday
  end: Date; // Sunday
  days: Date[];
};

export type CalendarSet = {
  holidays: DateSet;
  patching: DateSet;
  unavailability: UnavailabilityIndex;
};

export function toISODate(d: Date) {
  return format(d, "yyyy-MM-dd");
}

// Sunday counts as day 7, so it belongs to the week that started the Monday before
export function getWeekStart(d: Date): Date {
  return startOfWeek(d, { weekStartsOn: 1 });
}

export function getWeekWindow(d: Date): WeekWindow {
  const start = getWeekStart(d);
  const days: Date[] = [];
  for (let i = 0; i < 7; i++) {
    days.push(addDays(start, i));
  }
  return { start, end: days[6], days };
}

export function createCalendarSet(input: {
  holidays?: Iterable<string>;
  patching?: Iterable<string>;
  unavailability?: ReadonlyMap<string, Iterable<string>>;
} = {}): CalendarSet {
  const unavailability = new Map<string, DateSet>();
  for (const [member, dates] of input.unavailability ?? []) {
    unavailability.set(member, new Set(dates));
  }
  return {
    holidays: new Set(input.holidays ?? []),
    patching: new Set(input.patching ?? []),
    unavailability,
  };
}

export function containsHoliday(calendar: CalendarSet, d: Date): boolean {
  return calendar.holidays.has(toISODate(d));
}

export function containsPatching(calendar: CalendarSet, d: Date): boolean {
  return calendar.patching.has(toISODate(d));
}

export function isUnavailable(calendar: CalendarSet, member: string, d: Date): boolean {
  const off = calendar.unavailability.get(member);
  if (!off) return false;
  return off.has(toISODate(d));
}

export function weekHasHoliday(calendar: CalendarSet, window: WeekWindow): boolean {
  return window.days.some((d) => containsHoliday(calendar, d));
}

export function weekHasPatching(calendar: CalendarSet, window: WeekWindow): boolean {
  return window.days.some((d) => containsPatching(calendar, d));
}

export function memberAvailableForWeek(calendar: CalendarSet, member: string, window: WeekWindow): boolean {
  return !window.days.some((d) => isUnavailable(calendar, member, d));
}
