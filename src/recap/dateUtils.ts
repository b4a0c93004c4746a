import { formatInTimeZone } from "date-fns-tz";

export type RecapRange = "daily" | "weekly";

const SECONDS_PER_DAY = 24 * 60 * 60;

const RANGE_DAYS: Record<RecapRange, number> = {
  daily: 1,
  weekly: 7,
};

export interface RecapWindow {
  range: RecapRange;
  start: Date;
  end: Date;
}

export function computeWindow(range: RecapRange, now: Date): RecapWindow {
  const days = RANGE_DAYS[range];
  return {
    range,
    start: new Date(now.getTime() - days * SECONDS_PER_DAY * 1000),
    end: now,
  };
}

// GitHub search takes second precision; "Z" for UTC
export function formatSearchTimestamp(date: Date): string {
  return formatInTimeZone(date, "UTC", "yyyy-MM-dd'T'HH:mm:ssXXX");
}

// "October 05, 2026"
export function formatLongDate(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, "MMMM dd, yyyy");
}

export function formatDateStamp(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, "yyyy-MM-dd");
}

export function rangeLabel(range: RecapRange): string {
  return range === "weekly" ? "Weekly" : "Daily";
}
