import { TimeFormat } from "@core/types";

const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTH_NAMES = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

const pad2 = (value: number): string => value.toString().padStart(2, "0");

/**
 * Clock digits and, in 12 hour mode, the AM/PM marker.
 *
 * The two are split so the home screen can draw the digits large and the
 * marker small beside them. Local time; set TZ to move the device.
 */
export function formatClockParts(
  date: Date,
  format: TimeFormat,
): { digits: string; suffix: string } {
  const minutes = pad2(date.getMinutes());
  const hours = date.getHours();

  if (format === 24) {
    return { digits: `${pad2(hours)}:${minutes}`, suffix: "" };
  }

  const hours12 = hours % 12 === 0 ? 12 : hours % 12;
  return {
    digits: `${pad2(hours12)}:${minutes}`,
    suffix: hours < 12 ? "AM" : "PM",
  };
}

/**
 * "19:05" or "07:05 PM"
 */
export function formatClock(date: Date, format: TimeFormat): string {
  const { digits, suffix } = formatClockParts(date, format);
  return suffix ? `${digits} ${suffix}` : digits;
}

/**
 * "Mon, Jan 05"
 */
export function formatShortDate(date: Date): string {
  return `${DAY_NAMES[date.getDay()]}, ${MONTH_NAMES[date.getMonth()]} ${pad2(date.getDate())}`;
}

/**
 * Shorten `text` to `maxChars`, marking the cut with "..."
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxChars - 3))}...`;
}
