import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import type { CalendarDate } from "../calendar/CalendarAdapter.js";

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

const DATE_FORMAT = "YYYY-MM-DD";

export function isCalendarDate(value: string): value is CalendarDate {
  return dayjs(value, DATE_FORMAT, true).isValid();
}

export function dateOf(instant: Date, tz: string): CalendarDate {
  return dayjs(instant).tz(tz).format(DATE_FORMAT);
}

export function todayIn(tz: string, now: Date): CalendarDate {
  return dateOf(now, tz);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return dayjs.utc(date).add(days, "day").format(DATE_FORMAT);
}

/**
 * Local midnight of `date` and of the following day, as instants. Each end is
 * resolved in the zone on its own, so DST days span 23 or 25 hours.
 */
export function dayBounds(date: CalendarDate, tz: string): { start: Date; end: Date } {
  return {
    start: dayjs.tz(date, tz).toDate(),
    end: dayjs.tz(addDays(date, 1), tz).toDate(),
  };
}

export function compareDates(a: CalendarDate, b: CalendarDate) {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** 0 = Monday ... 6 = Sunday. */
export function weekdayOf(date: CalendarDate): number {
  return (dayjs.utc(date).day() + 6) % 7;
}

export function atWallClock(date: CalendarDate, hour: number, minute: number, tz: string): Date {
  const time = `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}:00`;
  return dayjs.tz(`${date}T${time}`, tz).toDate();
}

export function datesBetween(startDate: CalendarDate, endDate: CalendarDate): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (let day = startDate; compareDates(day, endDate) <= 0; day = addDays(day, 1)) {
    dates.push(day);
  }
  return dates;
}

export function datesOfMonth(year: number, month: number): CalendarDate[] {
  const first = dayjs.utc(`${year}-${String(month).padStart(2, "0")}-01`);
  return datesBetween(first.format(DATE_FORMAT), first.endOf("month").format(DATE_FORMAT));
}

export function addMinutes(instant: Date, minutes: number): Date {
  return dayjs(instant).add(minutes, "minute").toDate();
}

export function formatInZone(instant: Date, tz: string): string {
  return dayjs(instant).tz(tz).format();
}
