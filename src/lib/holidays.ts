import { addWeeks, getDay, lastDayOfMonth, nextDay, previousDay, type Day } from "date-fns";
import { toISODate } from "@/lib/calendar-engine";

export type HolidayDef = {
  id: string;
  name: string;
  date: string; // ISO YYYY-MM-DD
};

function nthWeekdayOfMonth(year: number, monthIndex: number, weekday: Day, n: number): Date {
  const first = new Date(year, monthIndex, 1);
  const firstMatch = getDay(first) === weekday ? first : nextDay(first, weekday);
  return addWeeks(firstMatch, n - 1);
}

function lastWeekdayOfMonth(year: number, monthIndex: number, weekday: Day): Date {
  const last = lastDayOfMonth(new Date(year, monthIndex, 1));
  return getDay(last) === weekday ? last : previousDay(last, weekday);
}

export function computeYearHolidays(year: number): HolidayDef[] {
  return [
    { id: "NEW_YEARS_DAY", name: "New Year's Day", date: toISODate(new Date(year, 0, 1)) },
    { id: "MLK_DAY", name: "MLK Day", date: toISODate(nthWeekdayOfMonth(year, 0, 1, 3)) }, // Jan, Monday, 3rd
    { id: "PRESIDENTS_DAY", name: "Presidents Day", date: toISODate(nthWeekdayOfMonth(year, 1, 1, 3)) }, // Feb, Monday, 3rd
    { id: "MEMORIAL_DAY", name: "Memorial Day", date: toISODate(lastWeekdayOfMonth(year, 4, 1)) }, // May, Monday (last)
    { id: "JUNETEENTH", name: "Juneteenth", date: toISODate(new Date(year, 5, 19)) },
    { id: "INDEPENDENCE_DAY", name: "Independence Day", date: toISODate(new Date(year, 6, 4)) },
    { id: "LABOR_DAY", name: "Labor Day", date: toISODate(nthWeekdayOfMonth(year, 8, 1, 1)) }, // Sep, Monday, 1st
    { id: "INDIGENOUS_PEOPLES_DAY", name: "Indigenous Peoples Day", date: toISODate(nthWeekdayOfMonth(year, 9, 1, 2)) }, // Oct, Monday, 2nd
    { id: "VETERANS_DAY", name: "Veterans Day", date: toISODate(new Date(year, 10, 11)) },
    { id: "THANKSGIVING", name: "Thanksgiving", date: toISODate(nthWeekdayOfMonth(year, 10, 4, 4)) }, // Nov, Thursday, 4th
    { id: "CHRISTMAS_DAY", name: "Christmas Day", date: toISODate(new Date(year, 11, 25)) },
  ];
}

// Holidays for every calendar year the range touches, inclusive
export function computeHolidaysForRange(start: Date, end: Date): HolidayDef[] {
  const list: HolidayDef[] = [];
  for (let y = start.getFullYear(); y <= end.getFullYear(); y++) {
    list.push(...computeYearHolidays(y));
  }
  return list;
}
