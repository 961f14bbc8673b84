import { z } from 'zod';
import type { Coordinate } from '../../ports/LocationPort.js';
import type {
  FetchForecastOptions,
  TemperatureUnit,
  Weather,
  WeatherPort,
} from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import { symbolForOpenWeatherId } from './conditionSymbols.js';
import { fetchJson } from './fetchJson.js';

const conditionSchema = z.array(z.object({ id: z.number() }));

const openWeatherSchema = z.object({
  current: z.object({
    dt: z.number(),
    temp: z.number(),
    weather: conditionSchema,
  }),
  hourly: z.array(
    z.object({
      dt: z.number(),
      temp: z.number(),
      weather: conditionSchema,
    })
  ),
  daily: z.array(
    z.object({
      dt: z.number(),
      temp: z.object({ min: z.number(), max: z.number() }),
      weather: conditionSchema,
    })
  ),
});

export interface OpenWeatherAdapterOptions {
  apiKey: string;
  temperatureUnit: TemperatureUnit;
}

export class OpenWeatherAdapter implements WeatherPort {
  private readonly logger = createLogger({ adapter: 'OpenWeatherAdapter' });
  private readonly apiKey: string;
  private readonly unit: TemperatureUnit;

  constructor(options: OpenWeatherAdapterOptions) {
    this.apiKey = options.apiKey;
    this.unit = options.temperatureUnit;
  }

  async fetchForecast(coordinate: Coordinate, options: FetchForecastOptions = {}): Promise<Weather> {
    const logger = this.logger.child({ method: 'fetchForecast', ...coordinate });

    const units = this.unit === 'celsius' ? 'metric' : 'imperial';
    const url = `https://api.openweathermap.org/data/3.0/onecall?lat=${coordinate.latitude}&lon=${coordinate.longitude}&appid=${this.apiKey}&units=${units}&exclude=minutely,alerts`;

    logger.info('Fetching weather data');
    const data = await fetchJson('OpenWeather', url, openWeatherSchema, options.signal);

    const weather: Weather = {
      current: {
        timestamp: new Date(data.current.dt * 1000),
        temperature: { value: data.current.temp, unit: this.unit },
        symbolName: symbolForOpenWeatherId(data.current.weather[0]?.id ?? 0),
      },
      hourly: data.hourly.map((h) => ({
        timestamp: new Date(h.dt * 1000),
        temperature: { value: h.temp, unit: this.unit },
        symbolName: symbolForOpenWeatherId(h.weather[0]?.id ?? 0),
      })),
      daily: data.daily.map((d) => ({
        date: new Date(d.dt * 1000),
        symbolName: symbolForOpenWeatherId(d.weather[0]?.id ?? 0),
        lowTemperature: { value: d.temp.min, unit: this.unit },
        highTemperature: { value: d.temp.max, unit: this.unit },
      })),
    };

    logger.info({ temp: weather.current.temperature.value }, 'Weather data fetched');
    return weather;
  }
}
