import { AcceptHeaderStrategy } from './accept-header.js';
import { CompositeStrategy } from './composite.js';
import { HeaderStrategy } from './header.js';
import { QueryParameterStrategy } from './query-param.js';
import type { ExtractionStrategy, StrategyOptions } from './types.js';
import { UrlPathStrategy } from './url-path.js';

export function createStrategy(options: StrategyOptions): ExtractionStrategy {
  switch (options.kind) {
    case 'url_path':
      return new UrlPathStrategy(options);
    case 'header':
      return new HeaderStrategy(options);
    case 'query_param':
      return new QueryParameterStrategy(options);
    case 'accept_header':
      return new AcceptHeaderStrategy(options);
    case 'composite':
      return new CompositeStrategy(createStrategies(options.strategies), options);
  }
}

export function createStrategies(options: readonly StrategyOptions[]): ExtractionStrategy[] {
  return options.map(createStrategy);
}

/** URL path strategies at any depth, in evaluation order. */
export function urlPathStrategies(strategies: readonly ExtractionStrategy[]): UrlPathStrategy[] {
  const found: UrlPathStrategy[] = [];
  for (const strategy of strategies) {
    if (strategy instanceof UrlPathStrategy) {
      found.push(strategy);
    } else if (strategy instanceof CompositeStrategy) {
      found.push(...urlPathStrategies(strategy.strategies));
    }
  }
  return found;
}

export { AcceptHeaderStrategy, DEFAULT_VENDOR_PATTERN } from './accept-header.js';
export { byPriority } from './base.js';
export { CompositeStrategy } from './composite.js';
export { DEFAULT_VERSION_HEADER, HeaderStrategy, readSubField } from './header.js';
export { DEFAULT_VERSION_QUERY_PARAM, QueryParameterStrategy } from './query-param.js';
export { UrlPathStrategy } from './url-path.js';
export * from './types.js';
