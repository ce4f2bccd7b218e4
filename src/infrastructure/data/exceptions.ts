/**
 * @fileoverview Data-layer exceptions
 *
 * @module layered-app-kit/infrastructure/data
 *
 * ## Architectural Layer: DATA
 *
 * Remote and local data sources throw these. They never leave the data layer:
 * repositories run data-source calls through {@link guardDataCall}, which
 * turns every exception into a {@link Failure} value.
 */

/**
 * Base class for everything a data source throws on purpose.
 */
export class DataException extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The remote answered with a non-success status.
 */
export class ServerException extends DataException {
  constructor(
    public readonly statusCode: number,
    message: string = `Server responded with status ${statusCode}`,
    public readonly body?: unknown,
  ) {
    super(message);
  }
}

/**
 * The remote could not be reached.
 */
export class NetworkException extends DataException {
  constructor(message: string = 'Network request failed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The remote did not answer in time.
 */
export class TimeoutException extends NetworkException {
  constructor(
    message: string = 'Request timed out',
    public readonly timeoutMs?: number,
  ) {
    super(message);
  }
}

/**
 * Local storage could not be read or written.
 */
export class CacheException extends DataException {
  constructor(message: string = 'Local storage error', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Per-path problems found while decoding a payload.
 */
export type FormatIssues = Readonly<Record<string, readonly string[]>>;

/**
 * A payload was not valid JSON or did not have the expected shape.
 */
export class FormatException extends DataException {
  constructor(
    message: string,
    public readonly issues: FormatIssues = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
