import type { Coordinate, LocationListener, LocationPort } from '../../ports/LocationPort.js';
import type { LocationErrorReason } from '../../utils/errors.js';
import { LocationError } from '../../utils/errors.js';

/**
 * Fixes pushed in by a client, typically a browser forwarding its geolocation
 * through `POST /location`. Reports arriving while no listener is attached are
 * dropped.
 */
export class PushLocationAdapter implements LocationPort {
  private listener: LocationListener | undefined;

  startUpdates(listener: LocationListener): void {
    this.listener = listener;
  }

  stopUpdates(): void {
    this.listener = undefined;
  }

  pushPositions(positions: readonly Coordinate[]): void {
    this.listener?.onLocationUpdate(positions);
  }

  pushError(reason: Exclude<LocationErrorReason, 'lookup_failed'>): void {
    const message = reason === 'permission_denied' ? 'Location permission denied' : 'No position fix';
    this.listener?.onLocationError?.(new LocationError(reason, message));
  }
}
