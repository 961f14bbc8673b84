import { vi } from 'vitest';
import type { Coordinate, LocationListener, LocationPort } from '../../ports/LocationPort.js';
import type { DaySample, HourSample, Weather } from '../../ports/WeatherPort.js';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

// A Monday, 12:00 UTC
export const NOW = new Date(Date.UTC(2026, 2, 2, 12, 0, 0));

export const NEW_YORK: Coordinate = { latitude: 40.7128, longitude: -74.006 };
export const LONDON: Coordinate = { latitude: 51.5072, longitude: -0.1276 };

export function hourSample(offsetHours: number, value = 20 + offsetHours, from: Date = NOW): HourSample {
  return {
    timestamp: new Date(from.getTime() + offsetHours * HOUR_MS),
    temperature: { value, unit: 'celsius' },
    symbolName: 'sun.max',
  };
}

export function daySample(offsetDays: number, from: Date = NOW): DaySample {
  return {
    date: new Date(from.getTime() + offsetDays * DAY_MS),
    symbolName: 'cloud.rain',
    lowTemperature: { value: 10 + offsetDays, unit: 'celsius' },
    highTemperature: { value: 18.4 + offsetDays, unit: 'celsius' },
  };
}

/** Hourly samples from 3h before NOW to 44h after; ten days starting today. */
export function makeWeather(from: Date = NOW): Weather {
  const hourly: HourSample[] = [];
  for (let offset = -3; offset <= 44; offset++) {
    hourly.push(hourSample(offset, 20 + offset * 0.5, from));
  }
  const daily: DaySample[] = [];
  for (let offset = 0; offset < 10; offset++) {
    daily.push(daySample(offset, from));
  }
  return {
    current: { timestamp: from, temperature: { value: 21.4, unit: 'celsius' }, symbolName: 'sun.max' },
    hourly,
    daily,
  };
}

export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets pending promise callbacks and immediates run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class FakeLocationPort implements LocationPort {
  listener: LocationListener | undefined;

  readonly startUpdates = vi.fn((listener: LocationListener) => {
    this.listener = listener;
  });

  readonly stopUpdates = vi.fn(() => {
    this.listener = undefined;
  });
}
