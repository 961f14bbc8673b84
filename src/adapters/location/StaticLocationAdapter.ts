import type { Coordinate, LocationListener, LocationPort } from '../../ports/LocationPort.js';
import { createLogger } from '../../utils/logger.js';

/** A fixed position, delivered once on the tick after updates start. */
export class StaticLocationAdapter implements LocationPort {
  private readonly logger = createLogger({ adapter: 'StaticLocationAdapter' });
  private timer: NodeJS.Immediate | undefined;

  constructor(private readonly coordinate: Coordinate) {}

  startUpdates(listener: LocationListener): void {
    this.stopUpdates();
    this.timer = setImmediate(() => {
      this.timer = undefined;
      this.logger.debug({ ...this.coordinate }, 'Delivering configured location');
      listener.onLocationUpdate([this.coordinate]);
    });
  }

  stopUpdates(): void {
    if (this.timer) {
      clearImmediate(this.timer);
      this.timer = undefined;
    }
  }
}
