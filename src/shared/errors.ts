export class HarvestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HarvestError';
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * Connection failure, timeout or bad status from an HTTP request.
 * `retryable` is set for failures worth another attempt (connection, timeout, 5xx).
 */
export class NetworkError extends HarvestError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    details?: Record<string, unknown> & { url?: string; status?: number },
  ) {
    super(message, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }

  get status(): number | undefined {
    const status = this.details?.['status'];
    return typeof status === 'number' ? status : undefined;
  }
}

export class ParseError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class DriverError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DRIVER_ERROR', details);
    this.name = 'DriverError';
  }
}

export class LoadError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LOAD_ERROR', details);
    this.name = 'LoadError';
  }
}

export class CancelledError extends HarvestError {
  constructor(message = 'Operation cancelled', details?: Record<string, unknown>) {
    super(message, 'CANCELLED', details);
    this.name = 'CancelledError';
  }
}
