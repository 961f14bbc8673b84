import { describe, it, expect } from 'vitest';
import {
  formatAbbreviatedHour,
  formatAbbreviatedWeekday,
  formatTemperature,
} from '../../core/forecast/format.js';

describe('formatAbbreviatedHour', () => {
  it('formats afternoon hours on a 12-hour clock', () => {
    expect(formatAbbreviatedHour(new Date('2026-03-02T14:00:00Z'), 'UTC')).toBe('2PM');
  });

  it('formats midnight and noon', () => {
    expect(formatAbbreviatedHour(new Date('2026-03-02T00:00:00Z'), 'UTC')).toBe('12AM');
    expect(formatAbbreviatedHour(new Date('2026-03-02T12:00:00Z'), 'UTC')).toBe('12PM');
  });

  it('drops minutes', () => {
    expect(formatAbbreviatedHour(new Date('2026-03-02T09:45:00Z'), 'UTC')).toBe('9AM');
  });

  it('uses the given time zone', () => {
    // EST, UTC-5
    expect(formatAbbreviatedHour(new Date('2026-03-02T19:00:00Z'), 'America/New_York')).toBe('2PM');
  });

  it('defaults to UTC', () => {
    expect(formatAbbreviatedHour(new Date('2026-03-02T23:00:00Z'))).toBe('11PM');
  });

  it('returns an empty label for an invalid date', () => {
    expect(formatAbbreviatedHour(new Date(Number.NaN), 'UTC')).toBe('');
  });
});

describe('formatAbbreviatedWeekday', () => {
  it('formats a Monday as MON', () => {
    expect(formatAbbreviatedWeekday(new Date('2026-03-02T12:00:00Z'), 'UTC')).toBe('MON');
  });

  it('uses the calendar day of the given time zone', () => {
    expect(formatAbbreviatedWeekday(new Date('2026-03-02T02:00:00Z'), 'America/Los_Angeles')).toBe('SUN');
  });

  it('returns an empty label for an invalid date', () => {
    expect(formatAbbreviatedWeekday(new Date('not a date'), 'UTC')).toBe('');
  });
});

describe('formatTemperature', () => {
  it('rounds to whole degrees with a unit suffix', () => {
    expect(formatTemperature({ value: 21.6, unit: 'celsius' })).toBe('22°C');
    expect(formatTemperature({ value: 70.2, unit: 'fahrenheit' })).toBe('70°F');
  });

  it('never prints a negative zero', () => {
    expect(formatTemperature({ value: -0.4, unit: 'celsius' })).toBe('0°C');
  });
});
