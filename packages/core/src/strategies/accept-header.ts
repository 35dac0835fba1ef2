import type { RequestView } from '../request-view.js';
import { BaseStrategy } from './base.js';
import { readSubField } from './header.js';
import type { AcceptHeaderStrategyOptions, RawToken } from './types.js';

/** Matches media types such as `application/vnd.acme.v2+json`. */
export const DEFAULT_VENDOR_PATTERN = /^[\w.+-]+\/vnd\.(?:[\w-]+\.)+v(\d[\w.-]*)\+[\w-]+$/i;

function vendorRegExp(option: boolean | string | undefined): RegExp | null {
  if (option === undefined || option === false) return null;
  if (option === true) return DEFAULT_VENDOR_PATTERN;
  return new RegExp(option, 'i');
}

export class AcceptHeaderStrategy extends BaseStrategy {
  readonly kind = 'accept_header';
  readonly parameter: string;
  readonly mediaType: string | null;
  private readonly vendor: RegExp | null;

  constructor(options: Omit<AcceptHeaderStrategyOptions, 'kind'> = {}) {
    super('accept_header', options);
    this.parameter = options.parameter ?? 'version';
    this.mediaType = options.mediaType?.toLowerCase() ?? null;
    this.vendor = vendorRegExp(options.vendorPattern);
  }

  extract(request: RequestView): RawToken | null {
    if (request.accept === null) return null;

    for (const range of request.accept.split(',')) {
      const separator = range.indexOf(';');
      const type = (separator === -1 ? range : range.slice(0, separator)).trim().toLowerCase();
      if (type.length === 0) continue;

      if (separator !== -1 && (this.mediaType === null || this.mediaType === type)) {
        const value = readSubField(range.slice(separator + 1), this.parameter);
        if (value !== undefined) {
          return this.token(value, `accept:${type};${this.parameter}`);
        }
      }

      const vendorMatch = this.vendor?.exec(type)?.[1];
      if (vendorMatch !== undefined) {
        return this.token(vendorMatch, `accept:${type}`);
      }
    }
    return null;
  }

  protected parameters(): Record<string, unknown> {
    return {
      parameter: this.parameter,
      mediaType: this.mediaType,
      vendorPattern: this.vendor?.source ?? null
    };
  }
}
