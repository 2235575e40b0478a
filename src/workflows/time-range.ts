/**
 * Time ranges like "9:00 AM - 11:30 AM" resolved against a trip day.
 * Results are trip-local wall-clock strings (`YYYY-MM-DDTHH:mm:ss`).
 */

export interface TimeRange {
  start: string;
  end: string;
}

const RANGE_PATTERN = /^\s*(\d{1,2}):(\d{2})\s*([AP]M)\s*-\s*(\d{1,2}):(\d{2})\s*([AP]M)\s*$/i;
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

const DEFAULT_START_MINUTES = 9 * 60;
const MINUTES_PER_DAY = 24 * 60;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Minutes after midnight for a 12-hour clock reading, or undefined when out of range
 */
function toMinutes(hourText: string, minuteText: string, meridiem: string): number | undefined {
  const hour = Number(hourText);
  const minute = Number(minuteText);
  if (hour < 1 || hour > 12 || minute > 59) return undefined;

  const hour24 = (hour % 12) + (meridiem.toUpperCase() === 'PM' ? 12 : 0);
  return hour24 * 60 + minute;
}

/**
 * Add whole days to a YYYY-MM-DD date
 */
export function addDays(day: string, days: number): string {
  const match = DAY_PATTERN.exec(day);
  if (!match) return day;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]) + days));
  return date.toISOString().slice(0, 10);
}

function stamp(day: string, minutes: number): string {
  const dayOffset = Math.floor(minutes / MINUTES_PER_DAY);
  const within = minutes % MINUTES_PER_DAY;
  return `${addDays(day, dayOffset)}T${pad(Math.floor(within / 60))}:${pad(within % 60)}:00`;
}

/**
 * Parse `text` on `day`. Never throws: unreadable input gives 09:00-10:00,
 * and an end at or before the start becomes start + 1h.
 */
export function parseTimeRange(text: string | undefined, day: string): TimeRange {
  const date = day.slice(0, 10);
  const match = text ? RANGE_PATTERN.exec(text) : null;

  let start: number | undefined;
  let end: number | undefined;
  if (match) {
    start = toMinutes(match[1], match[2], match[3]);
    end = toMinutes(match[4], match[5], match[6]);
  }

  if (start === undefined || end === undefined) {
    start = DEFAULT_START_MINUTES;
    end = DEFAULT_START_MINUTES + 60;
  } else if (end <= start) {
    end = start + 60;
  }

  return { start: stamp(date, start), end: stamp(date, end) };
}
