const MS_IN_SECOND = 1000;
export const MS_IN_MINUTE = 60 * MS_IN_SECOND;
export const MS_IN_HOUR = 60 * MS_IN_MINUTE;

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * MS_IN_HOUR);
}

export function differenceInMs(a: Date, b: Date): number {
  return a.getTime() - b.getTime();
}

export function floorToStep(date: Date, stepMs: number): Date {
  const time = date.getTime();
  const floored = Math.floor(time / stepMs) * stepMs;
  return new Date(floored);
}

/**
 * Parses an ISO-8601 timestamp (offset included) into epoch milliseconds.
 * Returns `null` for missing or unparseable input.
 */
export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) {
    return null;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

const clockFormats = new Map<string, Intl.DateTimeFormat>();
const stampFormats = new Map<string, Intl.DateTimeFormat>();

function cachedFormat(
  cache: Map<string, Intl.DateTimeFormat>,
  timeZone: string,
  options: Intl.DateTimeFormatOptions,
): Intl.DateTimeFormat {
  let format = cache.get(timeZone);
  if (!format) {
    format = new Intl.DateTimeFormat('en-US', { ...options, timeZone });
    cache.set(timeZone, format);
  }
  return format;
}

function partsOf(format: Intl.DateTimeFormat, date: Date): Record<string, string> {
  const parts: Record<string, string> = {};
  for (const part of format.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

/** `HH:MM` on a 24-hour clock in the given zone. */
export function formatClock(date: Date | number, timeZone: string): string {
  const format = cachedFormat(clockFormats, timeZone, {
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });
  const parts = partsOf(format, typeof date === 'number' ? new Date(date) : date);
  return `${parts['hour']}:${parts['minute']}`;
}

/** Compact render stamp, e.g. `oct 18 2026 05:50`. */
export function formatStamp(date: Date, timeZone: string): string {
  const format = cachedFormat(stampFormats, timeZone, {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });
  const parts = partsOf(format, date);
  return `${parts['month'].toLowerCase()} ${parts['day']} ${parts['year']} ${parts['hour']}:${parts['minute']}`;
}
