export class WeatherError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends WeatherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends WeatherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

export class UsageError extends WeatherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'USAGE_ERROR', options);
    this.name = 'UsageError';
  }
}

export class TransportError extends WeatherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

export class WeatherApiError extends WeatherError {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string, detail?: string, options?: ErrorOptions) {
    super(
      detail ? `OpenWeather API error: ${status} (${detail})` : `OpenWeather API error: ${status}`,
      'API_ERROR',
      options
    );
    this.name = 'WeatherApiError';
    this.status = status;
    this.body = body;
  }
}

export class DecodeError extends WeatherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'DECODE_ERROR', options);
    this.name = 'DecodeError';
  }
}
