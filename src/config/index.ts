import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const configSchema = z.object({
  // Location
  locationSource: z.enum(['static', 'ip', 'push']).default('static'),
  locationLabel: z.string().min(1).default('New York'),
  locationLatitude: z.coerce.number().min(-90).max(90).default(40.7128),
  locationLongitude: z.coerce.number().min(-180).max(180).default(-74.006),

  // Weather provider (Open-Meteo unless an OpenWeatherMap key is set)
  openWeatherApiKey: z.string().optional(),
  temperatureUnit: z.enum(['celsius', 'fahrenheit']).default('celsius'),
  hourlyWindowSize: z.coerce.number().int().positive().default(24),

  // Display
  timezone: z.string().refine(isTimeZone, 'Unknown IANA time zone').default('UTC'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    locationSource: env('LOCATION_SOURCE'),
    locationLabel: env('LOCATION_LABEL'),
    locationLatitude: env('LOCATION_LATITUDE'),
    locationLongitude: env('LOCATION_LONGITUDE'),
    openWeatherApiKey: env('OPENWEATHER_API_KEY'),
    temperatureUnit: env('TEMPERATURE_UNIT'),
    hourlyWindowSize: env('HOURLY_WINDOW_SIZE'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
