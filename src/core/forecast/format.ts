import type { Temperature } from '../../ports/WeatherPort.js';

// Labels always use the en-US calendar in an explicit zone; callers pass the
// configured TIMEZONE.
export const DEFAULT_TIME_ZONE = 'UTC';

const hourFormatters = new Map<string, Intl.DateTimeFormat>();
const weekdayFormatters = new Map<string, Intl.DateTimeFormat>();

function cached(
  cache: Map<string, Intl.DateTimeFormat>,
  timeZone: string,
  options: Intl.DateTimeFormatOptions
): Intl.DateTimeFormat {
  let formatter = cache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', { ...options, timeZone });
    cache.set(timeZone, formatter);
  }
  return formatter;
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/** "2PM", "12AM". */
export function formatAbbreviatedHour(timestamp: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
  if (!isValidDate(timestamp)) return '';

  const parts = cached(hourFormatters, timeZone, { hour: 'numeric', hour12: true }).formatToParts(timestamp);
  const hour = parts.find((part) => part.type === 'hour')?.value ?? '';
  const period = parts.find((part) => part.type === 'dayPeriod')?.value ?? '';
  return `${hour}${period.toUpperCase()}`;
}

/** "MON", "TUE". */
export function formatAbbreviatedWeekday(timestamp: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
  if (!isValidDate(timestamp)) return '';
  return cached(weekdayFormatters, timeZone, { weekday: 'short' }).format(timestamp).toUpperCase();
}

export function formatTemperature(temperature: Temperature): string {
  const symbol = temperature.unit === 'celsius' ? 'C' : 'F';
  return `${Math.round(temperature.value)}°${symbol}`;
}
