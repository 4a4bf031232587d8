/**
 * Base exception for the price monitor
 */
export class MonitorException extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'MonitorException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Required configuration is missing or malformed. Fatal at startup.
 */
export class ConfigurationException extends MonitorException {
  constructor(
    message: string,
    public readonly keys: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationException';
  }
}

/**
 * A price provider call failed, timed out or returned an unusable payload
 */
export class PriceSourceException extends MonitorException {
  constructor(
    public readonly source: string,
    public readonly symbol: string,
    message: string,
    cause?: Error,
  ) {
    super(`${source} failed for ${symbol}: ${message}`, cause);
    this.name = 'PriceSourceException';
  }
}

/**
 * Alert content was admissible but could not be delivered
 */
export class NotifierException extends MonitorException {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'NotifierException';
  }
}
