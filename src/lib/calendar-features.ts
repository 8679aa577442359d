import { getDate, getDay, getISOWeek, getMonth, getQuarter, getYear, isValid } from "date-fns";
import { ParseError } from "./errors";
import type { CalendarFeatures } from "./types";

export const CALENDAR_COLUMNS: (keyof CalendarFeatures)[] = [
  "year",
  "month",
  "day",
  "day_of_week",
  "week_of_year",
  "quarter",
];

export function calendarFeatures(date: Date): CalendarFeatures {
  if (!isValid(date)) throw new ParseError(`Invalid date: ${String(date)}`);
  return {
    year: getYear(date),
    month: getMonth(date) + 1,
    day: getDate(date),
    // date-fns counts from Sunday=0; shift to Monday=0
    day_of_week: (getDay(date) + 6) % 7,
    week_of_year: getISOWeek(date),
    quarter: getQuarter(date),
  };
}
