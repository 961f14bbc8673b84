import type { Coordinate } from './LocationPort.js';

export type TemperatureUnit = 'celsius' | 'fahrenheit';

export interface Temperature {
  value: number;
  unit: TemperatureUnit;
}

export interface CurrentConditions {
  timestamp: Date;
  temperature: Temperature;
  symbolName: string;
}

export interface HourSample {
  timestamp: Date;
  temperature: Temperature;
  symbolName: string; // e.g. "cloud.rain"
}

export interface DaySample {
  date: Date;
  symbolName: string;
  lowTemperature: Temperature;
  highTemperature: Temperature;
}

export interface Weather {
  current: CurrentConditions;
  hourly: HourSample[]; // ascending by timestamp, as delivered
  daily: DaySample[];
}

export interface FetchForecastOptions {
  signal?: AbortSignal;
}

export interface WeatherPort {
  fetchForecast(coordinate: Coordinate, options?: FetchForecastOptions): Promise<Weather>;
}
