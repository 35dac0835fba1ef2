import { InvalidVersionError, MissingVersionError } from './errors.js';
import type { RequestView } from './request-view.js';
import { byPriority } from './strategies/base.js';
import type { ExtractionStrategy, RawToken } from './strategies/types.js';
import { Version, type VersionFormat } from './version.js';

export interface ResolverOptions {
  format: VersionFormat;
  defaultVersion: Version | null;
  strictVersioning: boolean;
}

export type VersionResolution =
  | { kind: 'requested'; version: Version; token: RawToken }
  | { kind: 'default'; version: Version };

/**
 * Walks strategies in ascending priority and stops at the first one that
 * produces a token. Later strategies are never consulted. A request without
 * a token gets the default version, or fails when none is configured.
 */
export class StrategyResolver {
  readonly strategies: readonly ExtractionStrategy[];

  constructor(
    strategies: readonly ExtractionStrategy[],
    private readonly options: ResolverOptions
  ) {
    this.strategies = byPriority(strategies);
  }

  extract(request: RequestView): RawToken | null {
    for (const strategy of this.strategies) {
      if (!strategy.enabled) continue;
      const token = strategy.extract(request);
      if (token !== null) return token;
    }
    return null;
  }

  resolve(request: RequestView): VersionResolution {
    const token = this.extract(request);

    if (token !== null) {
      try {
        return { kind: 'requested', version: Version.parse(token.value, this.options.format), token };
      } catch (error) {
        if (error instanceof InvalidVersionError) {
          throw error.withSource(token.source);
        }
        throw error;
      }
    }

    if (this.options.defaultVersion !== null) {
      return { kind: 'default', version: this.options.defaultVersion };
    }

    throw new MissingVersionError(this.strategies.filter((strategy) => strategy.enabled).map((strategy) => strategy.name));
  }
}
