import { headerValue, type RequestView } from '../request-view.js';
import { BaseStrategy } from './base.js';
import type { HeaderStrategyOptions, RawToken } from './types.js';

export const DEFAULT_VERSION_HEADER = 'x-api-version';

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/** Reads `field` out of a `key=value; key=value` header value. */
export function readSubField(value: string, field: string): string | undefined {
  const wanted = field.toLowerCase();
  for (const pair of value.split(/[;,]/)) {
    const separator = pair.indexOf('=');
    if (separator === -1) continue;
    const key = pair.slice(0, separator).trim().toLowerCase();
    if (key === wanted) {
      const found = unquote(pair.slice(separator + 1));
      return found.length > 0 ? found : undefined;
    }
  }
  return undefined;
}

export class HeaderStrategy extends BaseStrategy {
  readonly kind = 'header';
  readonly headers: readonly string[];
  readonly field: string | null;

  constructor(options: Omit<HeaderStrategyOptions, 'kind'> = {}) {
    super('header', options);
    const names = [options.header ?? DEFAULT_VERSION_HEADER, ...(options.alternatives ?? [])].map((name) =>
      name.toLowerCase()
    );
    this.headers = [...new Set(names)];
    this.field = options.field ?? null;
  }

  extract(request: RequestView): RawToken | null {
    for (const name of this.headers) {
      const value = headerValue(request, name);
      if (value === undefined) continue;

      if (this.field !== null && value.includes('=')) {
        const field = readSubField(value, this.field);
        if (field === undefined) continue;
        return this.token(field, `header:${name};${this.field}`);
      }

      return this.token(unquote(value), `header:${name}`);
    }
    return null;
  }

  protected parameters(): Record<string, unknown> {
    return { headers: [...this.headers], field: this.field };
  }
}
