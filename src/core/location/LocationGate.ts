import type { Coordinate, LocationListener, LocationPort } from '../../ports/LocationPort.js';
import type { LocationError } from '../../utils/errors.js';
import type { SerialQueue } from '../runtime/SerialQueue.js';
import { createLogger } from '../../utils/logger.js';
import { freezeCoordinate } from './coordinate.js';

export type LocationState =
  | { status: 'unset' }
  | { status: 'set'; coordinate: Coordinate };

export type LocationStateListener = (state: LocationState) => void;

/**
 * Holds the device location as a set-once value: the first update carrying a
 * position wins and every later update is ignored.
 *
 * Provider callbacks may arrive from any async context; the mutation itself is
 * re-marshaled onto the serial queue, which is also where subscribers are told.
 * Errors from the provider leave the gate unset.
 */
export class LocationGate implements LocationListener {
  private readonly logger = createLogger({ component: 'LocationGate' });
  private readonly listeners = new Set<LocationStateListener>();
  private current: LocationState = { status: 'unset' };

  constructor(
    private readonly locationPort: LocationPort,
    private readonly queue: SerialQueue
  ) {
    this.locationPort.startUpdates(this);
  }

  get state(): LocationState {
    return this.current;
  }

  get coordinate(): Coordinate | undefined {
    return this.current.status === 'set' ? this.current.coordinate : undefined;
  }

  onLocationUpdate(positions: readonly Coordinate[]): void {
    const latest = positions[positions.length - 1];
    if (latest === undefined || this.current.status === 'set') return;

    const coordinate = freezeCoordinate(latest);
    void this.queue.enqueue(() => {
      // A second update can pass the check above before this task runs
      if (this.current.status === 'set') return;

      this.current = { status: 'set', coordinate };
      this.logger.info({ ...coordinate }, 'Location acquired');
      this.notify();
    });
  }

  onLocationError(error: LocationError): void {
    this.logger.warn({ reason: error.reason, error }, 'Location unavailable');
  }

  subscribe(listener: LocationStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  stop(): void {
    this.locationPort.stopUpdates();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.current);
    }
  }
}
