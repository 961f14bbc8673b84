import type { Weather } from '../../ports/WeatherPort.js';
import { DEFAULT_WINDOW_SIZE, selectForecastWindow } from '../forecast/forecastWindow.js';
import {
  DEFAULT_TIME_ZONE,
  formatAbbreviatedHour,
  formatAbbreviatedWeekday,
  formatTemperature,
} from '../forecast/format.js';

export const HOURLY_HEADING = 'HOURLY FORECAST';
export const TEN_DAY_HEADING = '10 Day Forecast';
export const CHART_BAR_LIMIT = 10;

export interface HourlyItem {
  id: string;
  label: string;
  symbol: string;
  temperature: string;
}

export interface ChartBar {
  label: string;
  value: number;
}

export interface DayRow {
  id: string;
  day: string;
  symbol: string;
  low: string;
  high: string;
}

export interface ForecastScreen {
  title: string;
  currentTemperature: string;
  hourly: { heading: string; items: HourlyItem[] };
  chart: ChartBar[];
  tenDay: { heading: string; rows: DayRow[] };
}

export interface PresenterOptions {
  title: string;
  timeZone?: string;
  windowSize?: number;
}

/** Everything the renderer needs, already formatted; only chart values stay raw. */
export function buildForecastScreen(
  weather: Weather,
  now: Date,
  options: PresenterOptions
): ForecastScreen {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const window = selectForecastWindow(weather.hourly, now, options.windowSize ?? DEFAULT_WINDOW_SIZE);

  return {
    title: options.title,
    currentTemperature: formatTemperature(weather.current.temperature),
    hourly: {
      heading: HOURLY_HEADING,
      items: window.map((sample) => ({
        id: sample.timestamp.toISOString(),
        label: formatAbbreviatedHour(sample.timestamp, timeZone),
        symbol: `${sample.symbolName}.fill`,
        temperature: formatTemperature(sample.temperature),
      })),
    },
    chart: window.slice(0, CHART_BAR_LIMIT).map((sample) => ({
      label: formatAbbreviatedHour(sample.timestamp, timeZone),
      value: sample.temperature.value,
    })),
    tenDay: {
      heading: TEN_DAY_HEADING,
      rows: weather.daily.map((day) => ({
        id: day.date.toISOString(),
        day: formatAbbreviatedWeekday(day.date, timeZone),
        symbol: day.symbolName,
        low: formatTemperature(day.lowTemperature),
        high: formatTemperature(day.highTemperature),
      })),
    },
  };
}
