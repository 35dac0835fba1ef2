import { firstValue, type RequestView } from '../request-view.js';
import { BaseStrategy } from './base.js';
import type { QueryParameterStrategyOptions, RawToken } from './types.js';

export const DEFAULT_VERSION_QUERY_PARAM = 'version';

export class QueryParameterStrategy extends BaseStrategy {
  readonly kind = 'query_param';
  readonly params: readonly string[];
  readonly caseSensitive: boolean;

  constructor(options: Omit<QueryParameterStrategyOptions, 'kind'> = {}) {
    super('query_param', options);
    this.caseSensitive = options.caseSensitive ?? false;
    this.params = [...new Set([options.param ?? DEFAULT_VERSION_QUERY_PARAM, ...(options.alternatives ?? [])])];
  }

  extract(request: RequestView): RawToken | null {
    const entries = Object.entries(request.query);

    for (const param of this.params) {
      const wanted = this.caseSensitive ? param : param.toLowerCase();
      for (const [key, raw] of entries) {
        if ((this.caseSensitive ? key : key.toLowerCase()) !== wanted) continue;
        const value = firstValue(raw)?.trim();
        if (value) {
          return this.token(value, `query:${key}`);
        }
      }
    }
    return null;
  }

  protected parameters(): Record<string, unknown> {
    return { params: [...this.params], caseSensitive: this.caseSensitive };
  }
}
