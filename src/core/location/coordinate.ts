import type { Coordinate } from '../../ports/LocationPort.js';

export function freezeCoordinate(position: Coordinate): Coordinate {
  return Object.freeze({ latitude: position.latitude, longitude: position.longitude });
}

export function coordinateKey(coordinate: Coordinate): string {
  return `${coordinate.latitude},${coordinate.longitude}`;
}
