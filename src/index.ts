// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { createLogger } from './utils/logger.js';
import type { LocationPort } from './ports/LocationPort.js';
import type { WeatherPort } from './ports/WeatherPort.js';
import { SerialQueue } from './core/runtime/SerialQueue.js';
import { LocationGate } from './core/location/LocationGate.js';
import { ForecastController } from './core/forecast/ForecastController.js';
import { StaticLocationAdapter } from './adapters/location/StaticLocationAdapter.js';
import { IpLocationAdapter } from './adapters/location/IpLocationAdapter.js';
import { PushLocationAdapter } from './adapters/location/PushLocationAdapter.js';
import { OpenMeteoAdapter } from './adapters/weather/OpenMeteoAdapter.js';
import { OpenWeatherAdapter } from './adapters/weather/OpenWeatherAdapter.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

function createLocationPort(config: Config): LocationPort {
  switch (config.locationSource) {
    case 'ip':
      return new IpLocationAdapter();
    case 'push':
      return new PushLocationAdapter();
    case 'static':
      return new StaticLocationAdapter({
        latitude: config.locationLatitude,
        longitude: config.locationLongitude,
      });
  }
}

function createWeatherPort(config: Config): WeatherPort {
  return config.openWeatherApiKey
    ? new OpenWeatherAdapter({ apiKey: config.openWeatherApiKey, temperatureUnit: config.temperatureUnit })
    : new OpenMeteoAdapter({ temperatureUnit: config.temperatureUnit, timeZone: config.timezone });
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info({ locationSource: config.locationSource }, 'Starting forecast service');

  const queue = new SerialQueue();
  const locationPort = createLocationPort(config);
  const weatherPort = createWeatherPort(config);

  const controller = new ForecastController(weatherPort, queue);
  const gate = new LocationGate(locationPort, queue);
  controller.bindTo(gate);

  const server = await startServer(
    {
      gate,
      controller,
      presenter: {
        title: config.locationLabel,
        timeZone: config.timezone,
        windowSize: config.hourlyWindowSize,
      },
      pushLocation: locationPort instanceof PushLocationAdapter ? locationPort : undefined,
    },
    config.port,
    config.host
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    gate.stop();
    server.close((error) => {
      if (error) {
        logger.error({ error }, 'Error while closing HTTP server');
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start application');
  process.exit(1);
});
