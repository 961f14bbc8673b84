import type { Coordinate } from '../../ports/LocationPort.js';
import type { Weather, WeatherPort } from '../../ports/WeatherPort.js';
import type { SerialQueue } from '../runtime/SerialQueue.js';
import type { LocationGate } from '../location/LocationGate.js';
import { createLogger } from '../../utils/logger.js';
import { coordinateKey } from '../location/coordinate.js';

export type WeatherListener = (weather: Weather | undefined) => void;

interface ActiveRequest {
  key: string;
  abort: AbortController;
  done?: Promise<void>;
}

/**
 * Keeps one forecast fetch alive per coordinate. A new coordinate aborts the
 * request in flight; whatever the aborted request later yields is dropped.
 *
 * A failed fetch leaves no forecast. There is no retry.
 */
export class ForecastController {
  private readonly logger = createLogger({ service: 'ForecastController' });
  private readonly listeners = new Set<WeatherListener>();
  private activeKey: string | undefined;
  private active: ActiveRequest | undefined;
  private current: Weather | undefined;

  constructor(
    private readonly weatherPort: WeatherPort,
    private readonly queue: SerialQueue
  ) {}

  get weather(): Weather | undefined {
    return this.current;
  }

  bindTo(gate: LocationGate): () => void {
    this.track(gate.coordinate);
    return gate.subscribe(() => this.track(gate.coordinate));
  }

  track(coordinate: Coordinate | undefined): void {
    const key = coordinate ? coordinateKey(coordinate) : undefined;
    if (key === this.activeKey) return;

    if (this.active) {
      this.logger.debug({ staleKey: this.active.key }, 'Superseding forecast request');
      this.active.abort.abort();
      this.active = undefined;
    }

    this.activeKey = key;
    if (!coordinate || key === undefined) return;

    const request: ActiveRequest = { key, abort: new AbortController() };
    this.active = request;
    request.done = this.fetch(coordinate, request);
  }

  subscribe(listener: WeatherListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once the request in flight (if any) has been applied or dropped. */
  async settled(): Promise<void> {
    await this.active?.done;
    await this.queue.onIdle();
  }

  private async fetch(coordinate: Coordinate, request: ActiveRequest): Promise<void> {
    const logger = this.logger.child({ method: 'fetch', key: request.key });
    logger.info('Fetching forecast');

    try {
      const weather = await this.weatherPort.fetchForecast(coordinate, {
        signal: request.abort.signal,
      });
      await this.queue.enqueue(() => {
        if (!this.isCurrent(request)) {
          logger.debug('Dropping forecast for superseded location');
          return;
        }
        this.active = undefined;
        this.apply(weather);
        logger.info({ hours: weather.hourly.length, days: weather.daily.length }, 'Forecast updated');
      });
    } catch (error) {
      await this.queue.enqueue(() => {
        if (!this.isCurrent(request)) return;
        this.active = undefined;
        logger.warn({ error }, 'Forecast fetch failed; showing no forecast');
        this.apply(undefined);
      });
    }
  }

  private isCurrent(request: ActiveRequest): boolean {
    return this.active === request;
  }

  private apply(weather: Weather | undefined): void {
    this.current = weather;
    for (const listener of this.listeners) {
      listener(weather);
    }
  }
}
