import type { RequestView } from '../request-view.js';
import { BaseStrategy, escapeRegExp } from './base.js';
import type { RawToken, UrlPathStrategyOptions } from './types.js';

function normalizeApiPrefix(value: string): string {
  const trimmed = value.replace(/^\/+|\/+$/g, '');
  return trimmed.length === 0 ? '' : `/${trimmed}`;
}

/**
 * Reads the version from a path segment such as `/v2/users` or
 * `/api/v1.1/users`. The segment must start with a digit right after the
 * prefix so that `/videos` is never mistaken for a version.
 */
export class UrlPathStrategy extends BaseStrategy {
  readonly kind = 'url_path';
  readonly prefix: string;
  readonly apiPrefix: string;
  private readonly pattern: RegExp;

  constructor(options: Omit<UrlPathStrategyOptions, 'kind'> = {}) {
    super('url_path', options);
    this.prefix = options.prefix ?? 'v';
    this.apiPrefix = normalizeApiPrefix(options.apiPrefix ?? '');
    this.pattern = new RegExp(`^${escapeRegExp(this.apiPrefix)}/${escapeRegExp(this.prefix)}(\\d[^/]*)(?=/|$)`);
  }

  extract(request: RequestView): RawToken | null {
    const match = this.pattern.exec(request.path);
    const value = match?.[1];
    if (value === undefined) return null;
    return this.token(value, `path:${this.apiPrefix}/${this.prefix}${value}`);
  }

  /** Removes the version segment, leaving any API prefix in place. */
  stripVersion(path: string): string | null {
    const match = this.pattern.exec(path);
    if (!match) return null;
    const rest = path.slice(match[0].length);
    const stripped = `${this.apiPrefix}${rest}`;
    return stripped.length === 0 ? '/' : stripped;
  }

  protected parameters(): Record<string, unknown> {
    return { prefix: this.prefix, apiPrefix: this.apiPrefix || null };
  }
}
