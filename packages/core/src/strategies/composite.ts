import type { RequestView } from '../request-view.js';
import { BaseStrategy, byPriority } from './base.js';
import type { CompositeStrategyOptions, ExtractionStrategy, RawToken, StrategyDescriptor } from './types.js';

/** Groups strategies so they occupy one slot in the outer priority order. */
export class CompositeStrategy extends BaseStrategy {
  readonly kind = 'composite';
  readonly strategies: readonly ExtractionStrategy[];

  constructor(strategies: readonly ExtractionStrategy[], options: Omit<CompositeStrategyOptions, 'kind' | 'strategies'> = {}) {
    super('composite', options);
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

  override describe(): StrategyDescriptor {
    return { ...super.describe(), strategies: this.strategies.map((strategy) => strategy.describe()) };
  }

  protected parameters(): Record<string, unknown> {
    return {};
  }
}
