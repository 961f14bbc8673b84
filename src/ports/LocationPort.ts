import type { LocationError } from '../utils/errors.js';

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface LocationListener {
  /** Zero or more fixes, oldest first. May be called from any async context. */
  onLocationUpdate(positions: readonly Coordinate[]): void;
  onLocationError?(error: LocationError): void;
}

export interface LocationPort {
  startUpdates(listener: LocationListener): void;
  stopUpdates(): void;
}
