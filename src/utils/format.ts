/**
 * Date labels for the store and the digest
 */

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    hourCycle: 'h23',
  }).formatToParts(date);

  const read = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((part) => part.type === type)?.value ?? '0', 10);

  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour') % 24,
    minute: read('minute'),
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function clock(parts: ZonedParts): { hour12: number; minute: string; meridiem: 'AM' | 'PM' } {
  return {
    hour12: parts.hour % 12 === 0 ? 12 : parts.hour % 12,
    minute: pad2(parts.minute),
    meridiem: parts.hour < 12 ? 'AM' : 'PM',
  };
}

/**
 * "9:05 AM" (12-hour, no leading zero)
 */
export function formatTimeLabel(date: Date, timeZone = 'UTC'): string {
  const { hour12, minute, meridiem } = clock(zonedParts(date, timeZone));
  return `${hour12}:${minute} ${meridiem}`;
}

/**
 * "May 01, 2024"
 */
export function formatLongDate(date: Date, timeZone = 'UTC'): string {
  const parts = zonedParts(date, timeZone);
  return `${MONTHS[parts.month - 1] ?? ''} ${pad2(parts.day)}, ${parts.year}`;
}

/**
 * "May 01, 2024 @ 09:05 AM", the store's display column
 */
export function formatStoreTime(date: Date, timeZone = 'UTC'): string {
  const parts = zonedParts(date, timeZone);
  const { hour12, minute, meridiem } = clock(parts);
  return `${formatLongDate(date, timeZone)} @ ${pad2(hour12)}:${minute} ${meridiem}`;
}
