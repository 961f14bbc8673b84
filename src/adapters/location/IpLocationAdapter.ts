import { z } from 'zod';
import type { LocationListener, LocationPort } from '../../ports/LocationPort.js';
import { LocationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const ipWhoIsSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  city: z.string().optional(),
});

/**
 * Resolves the host's approximate position from its public IP, once.
 * A failed lookup is reported to the listener and never retried.
 */
export class IpLocationAdapter implements LocationPort {
  private readonly logger = createLogger({ adapter: 'IpLocationAdapter' });
  private abort: AbortController | undefined;

  constructor(private readonly endpoint: string = 'https://ipwho.is/') {}

  startUpdates(listener: LocationListener): void {
    this.stopUpdates();
    const abort = new AbortController();
    this.abort = abort;

    void this.lookup(abort.signal)
      .then((position) => {
        if (abort.signal.aborted) return;
        listener.onLocationUpdate([position]);
      })
      .catch((error: unknown) => {
        if (abort.signal.aborted) return;
        const locationError =
          error instanceof LocationError
            ? error
            : new LocationError('lookup_failed', 'IP location lookup failed', { cause: error });
        listener.onLocationError?.(locationError);
      })
      .finally(() => {
        if (this.abort === abort) this.abort = undefined;
      });
  }

  stopUpdates(): void {
    this.abort?.abort();
    this.abort = undefined;
  }

  private async lookup(signal: AbortSignal): Promise<{ latitude: number; longitude: number }> {
    const response = await fetch(this.endpoint, { signal });
    if (!response.ok) {
      throw new LocationError('lookup_failed', `IP location lookup returned ${response.status}`);
    }

    const data = ipWhoIsSchema.parse(await response.json());
    if (!data.success || data.latitude === undefined || data.longitude === undefined) {
      throw new LocationError('position_unavailable', data.message ?? 'IP location has no coordinates');
    }

    this.logger.info({ city: data.city }, 'Resolved location from IP');
    return { latitude: data.latitude, longitude: data.longitude };
  }
}
