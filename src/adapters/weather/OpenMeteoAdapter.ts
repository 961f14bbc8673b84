import { z } from 'zod';
import type { Coordinate } from '../../ports/LocationPort.js';
import type {
  DaySample,
  FetchForecastOptions,
  HourSample,
  TemperatureUnit,
  Weather,
  WeatherPort,
} from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import { symbolForWmoCode } from './conditionSymbols.js';
import { fetchJson } from './fetchJson.js';

const FORECAST_DAYS = 10;

const openMeteoSchema = z.object({
  current: z.object({
    time: z.number(),
    temperature_2m: z.number(),
    weather_code: z.number(),
  }),
  hourly: z.object({
    time: z.array(z.number()),
    temperature_2m: z.array(z.number().nullable()),
    weather_code: z.array(z.number().nullable()),
  }),
  daily: z.object({
    time: z.array(z.number()),
    weather_code: z.array(z.number().nullable()),
    temperature_2m_max: z.array(z.number().nullable()),
    temperature_2m_min: z.array(z.number().nullable()),
  }),
});

type OpenMeteoResponse = z.infer<typeof openMeteoSchema>;

export interface OpenMeteoAdapterOptions {
  temperatureUnit: TemperatureUnit;
  /** IANA zone the daily buckets are cut in; should match the display zone. */
  timeZone?: string;
  baseUrl?: string;
}

export class OpenMeteoAdapter implements WeatherPort {
  private readonly logger = createLogger({ adapter: 'OpenMeteoAdapter' });
  private readonly unit: TemperatureUnit;
  private readonly timeZone: string;
  private readonly baseUrl: string;

  constructor(options: OpenMeteoAdapterOptions) {
    this.unit = options.temperatureUnit;
    this.timeZone = options.timeZone ?? 'GMT';
    this.baseUrl = options.baseUrl ?? 'https://api.open-meteo.com/v1/forecast';
  }

  async fetchForecast(coordinate: Coordinate, options: FetchForecastOptions = {}): Promise<Weather> {
    const logger = this.logger.child({ method: 'fetchForecast', ...coordinate });

    const params = new URLSearchParams({
      latitude: String(coordinate.latitude),
      longitude: String(coordinate.longitude),
      current: 'temperature_2m,weather_code',
      hourly: 'temperature_2m,weather_code',
      daily: 'weather_code,temperature_2m_max,temperature_2m_min',
      forecast_days: String(FORECAST_DAYS),
      temperature_unit: this.unit,
      timeformat: 'unixtime',
      timezone: this.timeZone,
    });

    logger.info('Fetching weather data');
    const data = await fetchJson('Open-Meteo', `${this.baseUrl}?${params.toString()}`, openMeteoSchema, options.signal);

    const weather: Weather = {
      current: {
        timestamp: new Date(data.current.time * 1000),
        temperature: { value: data.current.temperature_2m, unit: this.unit },
        symbolName: symbolForWmoCode(data.current.weather_code),
      },
      hourly: this.toHourly(data.hourly),
      daily: this.toDaily(data.daily),
    };

    logger.info({ hours: weather.hourly.length, days: weather.daily.length }, 'Weather data fetched');
    return weather;
  }

  // Open-Meteo pads the tail of its series with nulls; those samples are skipped.
  private toHourly(hourly: OpenMeteoResponse['hourly']): HourSample[] {
    const samples: HourSample[] = [];
    hourly.time.forEach((time, index) => {
      const temperature = hourly.temperature_2m[index];
      if (temperature == null) return;
      samples.push({
        timestamp: new Date(time * 1000),
        temperature: { value: temperature, unit: this.unit },
        symbolName: symbolForWmoCode(hourly.weather_code[index] ?? -1),
      });
    });
    return samples;
  }

  private toDaily(daily: OpenMeteoResponse['daily']): DaySample[] {
    const samples: DaySample[] = [];
    daily.time.forEach((time, index) => {
      const low = daily.temperature_2m_min[index];
      const high = daily.temperature_2m_max[index];
      if (low == null || high == null) return;
      samples.push({
        date: new Date(time * 1000),
        symbolName: symbolForWmoCode(daily.weather_code[index] ?? -1),
        lowTemperature: { value: low, unit: this.unit },
        highTemperature: { value: high, unit: this.unit },
      });
    });
    return samples;
  }
}
