/**
 * Versioning error taxonomy.
 *
 * Every failure raised by the engine carries a stable `code` and a
 * JSON-friendly `details` payload. Mapping codes to HTTP statuses is the
 * boundary layer's job (see @versionkit/http).
 */

import type { Version, VersionFormat } from './version.js';

export type VersioningErrorCode =
  | 'INVALID_VERSION'
  | 'MISSING_VERSION'
  | 'INCOMPARABLE_VERSIONS'
  | 'ROUTE_NOT_FOUND'
  | 'VERSION_NOT_FOUND'
  | 'UNSUPPORTED_VERSION'
  | 'VERSIONING_CONFIGURATION';

export abstract class VersioningError extends Error {
  abstract readonly code: VersioningErrorCode;
  readonly details: Record<string, unknown>;

  protected constructor(message: string, details: Record<string, unknown>) {
    super(message);
    this.details = details;
  }

  toJSON(): { code: VersioningErrorCode; message: string; details: Record<string, unknown> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class InvalidVersionError extends VersioningError {
  readonly code = 'INVALID_VERSION';

  constructor(
    readonly raw: string,
    readonly format: VersionFormat,
    readonly source: string | null = null
  ) {
    super(
      `Invalid ${format} version '${raw}'${source ? ` (from ${source})` : ''}.`,
      source ? { raw, format, source } : { raw, format }
    );
    this.name = 'InvalidVersionError';
  }

  withSource(source: string): InvalidVersionError {
    return new InvalidVersionError(this.raw, this.format, source);
  }
}

export class MissingVersionError extends VersioningError {
  readonly code = 'MISSING_VERSION';

  constructor(readonly strategies: readonly string[]) {
    super(`No API version supplied. Checked: ${strategies.join(', ')}.`, { strategies: [...strategies] });
    this.name = 'MissingVersionError';
  }
}

export class IncomparableVersionError extends VersioningError {
  readonly code = 'INCOMPARABLE_VERSIONS';

  /** `left` may be a bare format when the expectation comes from configuration. */
  constructor(left: Version | VersionFormat, right: Version) {
    const leftFormat = typeof left === 'string' ? left : left.format;
    const leftText = typeof left === 'string' ? `${left} versions` : `${left.format} version ${left.toString()}`;
    super(`Cannot compare ${leftText} with ${right.format} version ${right.toString()}.`, {
      left: typeof left === 'string' ? { format: leftFormat } : { version: left.toString(), format: leftFormat },
      right: { version: right.toString(), format: right.format }
    });
    this.name = 'IncomparableVersionError';
  }
}

export class RouteNotFoundError extends VersioningError {
  readonly code = 'ROUTE_NOT_FOUND';

  constructor(
    readonly path: string,
    readonly method: string
  ) {
    super(`No versioned route registered for ${method} ${path}.`, { path, method });
    this.name = 'RouteNotFoundError';
  }
}

export class VersionNotFoundError extends VersioningError {
  readonly code = 'VERSION_NOT_FOUND';

  constructor(
    readonly path: string,
    readonly method: string,
    readonly version: Version
  ) {
    super(`${method} ${path} has no handler for version ${version.toString()}.`, {
      path,
      method,
      version: version.toString()
    });
    this.name = 'VersionNotFoundError';
  }
}

export class UnsupportedVersionError extends VersioningError {
  readonly code = 'UNSUPPORTED_VERSION';
  readonly available: readonly Version[];

  constructor(
    readonly requested: Version,
    available: readonly Version[]
  ) {
    const listed = available.map((version) => version.toString());
    super(
      `Version ${requested.toString()} is not supported.${listed.length > 0 ? ` Available versions: ${listed.join(', ')}.` : ''}`,
      { requested: requested.toString(), available: listed }
    );
    this.name = 'UnsupportedVersionError';
    this.available = available;
  }
}

export class ConfigurationError extends VersioningError {
  readonly code = 'VERSIONING_CONFIGURATION';

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = 'ConfigurationError';
  }
}
