import { formatInTimeZone } from "date-fns-tz";
import { PollingWindow } from "../../config/polling.config";

/**
 * Minutes after local midnight for `date` in an IANA timezone.
 *
 * @example
 * // 2024-07-01T04:30:00Z is 06:30 in Warsaw (UTC+2)
 * minutesSinceMidnightInTimezone(new Date("2024-07-01T04:30:00Z"), "Europe/Warsaw") // 390
 */
export function minutesSinceMidnightInTimezone(
  date: Date,
  timezone: string,
): number {
  const [hours, minutes] = formatInTimeZone(date, timezone, "HH:mm")
    .split(":")
    .map((part) => parseInt(part, 10));
  return hours * 60 + minutes;
}

/**
 * Whether `date` falls inside the daily polling window (both ends inclusive).
 * A window whose end is before its start wraps past midnight.
 */
export function isWithinPollingWindow(
  date: Date,
  window: PollingWindow,
): boolean {
  const minute = minutesSinceMidnightInTimezone(date, window.timezone);
  if (window.startMinute <= window.endMinute) {
    return minute >= window.startMinute && minute <= window.endMinute;
  }
  return minute >= window.startMinute || minute <= window.endMinute;
}

export function formatPollingWindow(window: PollingWindow): string {
  return `${formatMinute(window.startMinute)}-${formatMinute(window.endMinute)}`;
}

function formatMinute(minute: number): string {
  const hh = String(Math.floor(minute / 60)).padStart(2, "0");
  const mm = String(minute % 60).padStart(2, "0");
  return `${hh}:${mm}`;
}
