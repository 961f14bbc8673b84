export class WeatherAppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherAppError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends WeatherAppError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class WeatherFetchError extends AdapterError {
  public readonly status: number | undefined;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('WEATHER', message, options);
    this.name = 'WeatherFetchError';
    this.status = options?.status;
  }
}

export type LocationErrorReason = 'permission_denied' | 'position_unavailable' | 'lookup_failed';

export class LocationError extends AdapterError {
  public readonly reason: LocationErrorReason;

  constructor(reason: LocationErrorReason, message: string, options?: ErrorOptions) {
    super('LOCATION', message, options);
    this.name = 'LocationError';
    this.reason = reason;
  }
}

export class ConfigError extends WeatherAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
